export { loadScreenerConfig, DEFAULT_FILES } from './screener-config.js';
export type { ScreenerConfig, ScreenerConfigOverrides, ScreenerFiles } from './screener-config.js';
