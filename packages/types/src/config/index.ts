export { ConfigLoader, CONFIG_FILE_NAMES, type ResolveConfigOptions } from './loader.js';
export { validateConfig } from './validator.js';
