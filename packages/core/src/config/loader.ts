import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { Config, ConfigInput, ConfigSchema, ConfigError } from '@constify/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Source root (for repo config)
  env?: NodeJS.ProcessEnv; // Environment variables
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const USER_CONFIG_DIR = '.constify';
export const REPO_CONFIG_FILE = '.constify.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): PlainObject {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: PlainObject, source: PlainObject): PlainObject {
    const output = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.constify/config.yaml
    const userConfigPath = path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml');
    const userConfig = this.loadYaml(userConfigPath);

    // 2. Repo config: <root>/.constify.yaml
    const repoConfigPath = path.join(cwd, REPO_CONFIG_FILE);
    const repoConfig = this.loadYaml(repoConfigPath);

    // 3. Explicit --config file (if provided)
    let explicitConfig: PlainObject = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: PlainObject = options.flags || {};

    // flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const finalConfig = result.data;

    // Handle `api_key_env` resolution
    const provider = finalConfig.provider;
    if (!provider.api_key && env[provider.api_key_env]) {
      provider.api_key = env[provider.api_key_env];
    }

    return finalConfig;
  }
}
