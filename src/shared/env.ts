export const ASSETCTL_PLUGIN_ROOT_ENV = "ASSETCTL_PLUGIN_ROOT";
export const ASSETCTL_GLOBAL_DIR_ENV = "ASSETCTL_GLOBAL_DIR";
export const ASSETCTL_LOG_LEVEL_ENV = "ASSETCTL_LOG_LEVEL";
