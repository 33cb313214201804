export { loadConfig, ConfigError } from './loader.js'
export { DEFAULT_CONFIG, ENV_PREFIX } from './defaults.js'
