export { loadConfig, validateConfig, resolveConfigPath, CONFIG_FILE_NAME } from './ConfigLoader.js';
export type { Linger2IbexConfig } from './ConfigLoader.js';
