// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { ChainConfig } from '../types';
import { ConfigLoader, ConfigValidationResult } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = [
  './stack-chain.yml',
  './stack-chain.yaml',
  './stack-chain.json'
];

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class ChainConfigLoader implements ConfigLoader {

  /**
   * Load, substitute, merge overrides into, and validate a configuration file
   * @param path - Path to the configuration file (YAML or JSON)
   * @param overrides - Values taking precedence over the file (CLI flags)
   */
  async load(path: string, overrides: ConfigRecord = {}): Promise<ChainConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error(`Unsupported file format. Only .json, .yml, and .yaml files are supported.`);
      }

      // An empty YAML document parses to null
      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig ?? {});
      if (!isRecord(configWithEnvVars)) {
        throw new Error('Configuration must be a mapping at the top level');
      }

      return validateAndNormalizeConfig(this.deepMerge(configWithEnvVars, overrides));
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${path}: ${error.message}`);
      }
      throw new Error(`Failed to load configuration from ${path}: ${String(error)}`);
    }
  }

  /**
   * Build a configuration from defaults and overrides alone, without a file
   */
  fromDefaults(overrides: ConfigRecord = {}): ChainConfig {
    return validateAndNormalizeConfig(this.resolveEnvironmentVariables(overrides));
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first of `searchPaths` that exists; fall back to defaults when none does
   */
  async loadFromPaths(searchPaths: string[], overrides: ConfigRecord = {}): Promise<ChainConfig> {
    const found = searchPaths.find(path => existsSync(path));
    if (!found) {
      return this.fromDefaults(overrides);
    }
    return this.load(found, overrides);
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isRecord(value)) {
      const result: ConfigRecord = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset variable without a default keeps its placeholder
      return match;
    });
  }

  /**
   * Deep merge two objects, with the second object taking precedence
   */
  private deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const result: ConfigRecord = { ...target };

    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) {
        continue;
      }
      const existing = result[key];
      if (isRecord(value)) {
        result[key] = this.deepMerge(isRecord(existing) ? existing : {}, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

/**
 * Load the first of the standard configuration files found in `baseDir`,
 * or defaults when there is none
 */
export async function loadDefaultConfig(
  overrides: ConfigRecord = {},
  baseDir: string = process.cwd()
): Promise<ChainConfig> {
  const searchPaths = DEFAULT_CONFIG_PATHS.map(path => resolve(baseDir, path));
  return new ChainConfigLoader().loadFromPaths(searchPaths, overrides);
}
