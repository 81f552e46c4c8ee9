export { loadConfig, readConfigFile } from './loader';
export { getDataDir, ensureDataDir, getDbPath, getKeyPath, getConfigPath } from './paths';
export type { Env } from './paths';
export { ConfigError } from './errors';
