export * from './types';
export { loadConfig, getConfig, parseConfig, defaultConfig, writeDefaultConfig } from './loader';
