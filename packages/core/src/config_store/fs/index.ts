export { FsConfigStore, CONFIG_FILE_NAME, createConfigManager } from './fs_config_store';
