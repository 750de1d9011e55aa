export type {
  GitConfig,
  IConfigManager,
  NumberingConfig,
  PathsConfig,
  SpecPulseConfig,
  SpecPulseConfigFile,
} from './config_manager.types';
export {
  CONFIG_VERSION,
  ConfigManager,
  DEFAULT_CONFIG,
  resolveConfig,
  validateConfigDocument,
} from './config_manager';
