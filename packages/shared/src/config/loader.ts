import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '../errors';
import { RecallConfigSchema, type RecallConfig, type RecallConfigInput } from './schema';
import { formatZodIssues } from './validation';

export const CONFIG_FILENAME = '.recall.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: RecallConfigInput; // CLI flags
  cwd?: string; // Directory searched for .recall.yaml
  env?: NodeJS.ProcessEnv; // Environment variables
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): PlainObject {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Configuration in ${filePath} must be a mapping`);
    }
    return parsed;
  }

  static mergeConfigs(target: PlainObject, source: PlainObject): PlainObject {
    const output: PlainObject = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
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

  static fromEnv(env: NodeJS.ProcessEnv): PlainObject {
    const overrides: PlainObject = {};
    if (env.RECALL_DB_PATH) {
      overrides.storage = { path: env.RECALL_DB_PATH };
    }
    if (env.RECALL_LOG_FILE) {
      overrides.logging = { jsonlPath: env.RECALL_LOG_FILE };
    }
    return overrides;
  }

  /**
   * Resolution order, lowest to highest: defaults, `.recall.yaml` in `cwd`,
   * explicit `configPath`, environment, flags.
   */
  static load(options: ConfigOptions = {}): RecallConfig {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    let merged: PlainObject = this.loadYaml(path.join(cwd, CONFIG_FILENAME));

    if (options.configPath) {
      const explicitPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${explicitPath}`);
      }
      merged = this.mergeConfigs(merged, this.loadYaml(explicitPath));
    }

    merged = this.mergeConfigs(merged, this.fromEnv(env));
    if (options.flags) {
      merged = this.mergeConfigs(merged, options.flags);
    }

    const result = RecallConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration:\n${formatZodIssues(result.error)}`, {
        details: { issues: result.error.issues },
      });
    }

    const config = result.data;
    if (!path.isAbsolute(config.storage.path)) {
      config.storage.path = path.resolve(cwd, config.storage.path);
    }
    if (config.logging.jsonlPath && !path.isAbsolute(config.logging.jsonlPath)) {
      config.logging.jsonlPath = path.resolve(cwd, config.logging.jsonlPath);
    }
    return config;
  }
}
