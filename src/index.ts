export * from './library/index';
