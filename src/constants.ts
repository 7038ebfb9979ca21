export const CLI_NAME = "csv-fold";

// env var naming the config file when --config-path is not given
export const CONFIG_ENV = "CSV_FOLD_CONFIG";
export const DEFAULT_CONFIG_PATH = "config.json";

export const LOCK_SUFFIX = ".lock";
export const LOCK_POLL_MS = 100;
