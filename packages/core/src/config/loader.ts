import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, KnowledgeBaseConfigSchema } from '@logkb/shared';
import type { KnowledgeBaseConfig, KnowledgeBaseConfigInput } from '@logkb/shared';

export const USER_CONFIG_PATH = path.join('.logkb', 'config.yaml');
export const PROJECT_CONFIG_FILE = '.logkb.yaml';

export interface ConfigOptions {
  /** Explicit `--config` file; must exist. */
  configPath?: string;
  /** CLI flags, applied last. */
  flags?: KnowledgeBaseConfigInput;
  /** Directory holding the project config; relative paths resolve against it. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Defaults to the user's home directory. */
  homeDir?: string;
}

type ConfigTree = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigTree {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
    }
    return parsed;
  }

  /** Deep merge; arrays and primitives in `source` replace those in `target`. */
  static mergeConfigs(target: ConfigTree, source: ConfigTree): ConfigTree {
    const output: ConfigTree = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;
      const targetValue = output[key];
      output[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  /** `LOGKB_*` variables that override file configuration. */
  static envOverrides(env: NodeJS.ProcessEnv): ConfigTree {
    const overrides: ConfigTree = {};
    if (env.LOGKB_ROOT_DIR) {
      overrides.rootDir = env.LOGKB_ROOT_DIR;
    }
    if (env.LOGKB_EMBEDDING_MODEL) {
      overrides.embeddings = { modelId: env.LOGKB_EMBEDDING_MODEL };
    }
    if (env.LOGKB_TOP_K) {
      const topK = Number(env.LOGKB_TOP_K);
      if (!Number.isInteger(topK)) {
        throw new ConfigError(`LOGKB_TOP_K must be an integer, got "${env.LOGKB_TOP_K}"`);
      }
      overrides.retrieval = { topK };
    }
    return overrides;
  }

  /**
   * Resolves the configuration from, lowest precedence first: built-in
   * defaults, `~/.logkb/config.yaml`, `<cwd>/.logkb.yaml`, the explicit
   * config file, `LOGKB_*` environment variables and CLI flags.
   */
  static load(options: ConfigOptions = {}): KnowledgeBaseConfig {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    const userConfig = this.loadYaml(path.join(options.homeDir ?? os.homedir(), USER_CONFIG_PATH));
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    let explicitConfig: ConfigTree = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    let merged = this.mergeConfigs(userConfig, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, this.envOverrides(env));
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = KnowledgeBaseConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    return {
      ...config,
      rootDir: path.resolve(cwd, config.rootDir),
      logging: {
        ...config.logging,
        traceFile: config.logging.traceFile && path.resolve(cwd, config.logging.traceFile),
      },
    };
  }
}
