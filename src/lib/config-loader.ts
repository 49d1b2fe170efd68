import { GlobalConfig, DEFAULT_GLOBAL_CONFIG, GHOSTSCRIPT_ENV_VAR } from '../types/global-config';
import { fileExists, getGlobalConfigPath, readJson, expandHome } from '../utils/file-utils';

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigLoader {
  /**
   * Load global configuration.
   * Precedence: PDFSHRINK_GS > ~/.pdfshrink/config.json > defaults.
   * The config file is optional and never created here.
   */
  async load(options: LoadConfigOptions = {}): Promise<GlobalConfig> {
    const configPath = options.configPath ?? getGlobalConfigPath();
    const env = options.env ?? process.env;

    let config: GlobalConfig = { ...DEFAULT_GLOBAL_CONFIG };

    if (await fileExists(configPath)) {
      let raw: unknown;
      try {
        raw = await readJson(configPath);
      } catch (error) {
        throw new Error(`Failed to read config ${configPath}: ${(error as Error).message}`);
      }
      config = { ...config, ...this.parse(raw, configPath) };
    }

    const override = env[GHOSTSCRIPT_ENV_VAR];
    if (override !== undefined && override.trim() !== '') {
      config.ghostscriptBinary = expandHome(override.trim());
    }

    return config;
  }

  /**
   * Validate the parsed file. Unknown keys are ignored.
   */
  parse(raw: unknown, source: string): Partial<GlobalConfig> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new Error(`Invalid config ${source}: expected a JSON object`);
    }

    const result: Partial<GlobalConfig> = {};

    if ('ghostscriptBinary' in raw) {
      const binary = raw.ghostscriptBinary;
      if (typeof binary !== 'string' || binary.trim() === '') {
        throw new Error(`Invalid config ${source}: ghostscriptBinary must be a non-empty string`);
      }
      result.ghostscriptBinary = expandHome(binary.trim());
    }

    return result;
  }
}

export const configLoader = new ConfigLoader();
