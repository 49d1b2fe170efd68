export interface GlobalConfig {
  ghostscriptBinary: string;    // gs, or a full path such as /opt/homebrew/bin/gs
}

/**
 * Default global configuration
 */
export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = {
  ghostscriptBinary: 'gs',
};

/**
 * Environment variable that overrides ghostscriptBinary
 */
export const GHOSTSCRIPT_ENV_VAR = 'PDFSHRINK_GS';
