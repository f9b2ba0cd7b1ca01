export { Config, validateConfig } from './Config';
export type { AppConfig, StorageDriver } from './Config';
