import { MAX_LIMIT, isStrategy } from '../library/index';
import type { PrimeStrategy } from '../library/index';

export interface CliConfig {
  // Ordinal of the prime to compute, 1 for the first prime.
  count: number;
  strategy: PrimeStrategy;
  limit: number;
  // Print every prime up to `count` instead of only the last one.
  list: boolean;
}

export const defaultConfig: CliConfig = {
  count: 1_000_000,
  strategy: 'trial-division',
  limit: MAX_LIMIT,
  list: false,
};

function parseInteger(key: string, value: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  // Digits only; parseInt alone takes "10abc" as 10.
  const parsed = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    throw new Error(`Invalid config var ${key}: ${value}`);
  }
  return parsed;
}

/**
 * Builds the run configuration from environment variables (populated from
 * `.env` by dotenv) and positional arguments. A count given on the command
 * line takes precedence over PRIME_COUNT.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): CliConfig {
  const config: CliConfig = { ...defaultConfig };

  const count = argv[0] ?? env.PRIME_COUNT;
  if (count !== undefined && count !== '') {
    config.count = parseInteger('PRIME_COUNT', count, 1);
  }

  const strategy = env.PRIME_STRATEGY;
  if (strategy !== undefined && strategy !== '') {
    if (!isStrategy(strategy)) {
      throw new Error(`Invalid config var PRIME_STRATEGY: ${strategy}`);
    }
    config.strategy = strategy;
  }

  if (env.PRIME_LIMIT) {
    config.limit = parseInteger('PRIME_LIMIT', env.PRIME_LIMIT, 2, MAX_LIMIT);
  }

  config.list = (env.PRIME_LIST || '').toLowerCase() == 'yes';
  return config;
}
