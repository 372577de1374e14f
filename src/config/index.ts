export * from './types';
export { getConfig, loadConfig, reloadConfig, mergeConfig, writeDefaultConfig, DEFAULT_CONFIG } from './loader';
