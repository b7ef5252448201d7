/**
 * Gerrit connection config: host, SSH port and username.
 *
 * Each value is looked up in order from:
 * 1. Environment (GERRIT_HOST, GERRIT_PORT, GERRIT_USER)
 * 2. Config file (~/.config/gerrit-review-parser/config.json)
 * 3. Defaults (port 29418)
 *
 * The config file is validated against schemas/gerrit-config.schema.json.
 *
 * @module gerrit-config
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { ConfigError, errorMessage } from './errors.ts';
import { createLazyValidator, formatSchemaErrors } from './schema-validator.ts';

// ────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────

export interface GerritConfig {
  host: string;
  port: string;
  user: string;
}

export type ConfigKey = keyof GerritConfig;

export type ConfigSource = 'env' | 'file' | 'default';

export interface ConfigProvider {
  source: ConfigSource;
  load(): Partial<GerritConfig>;
}

export interface ResolvedConfig {
  config: GerritConfig;
  /** Where each value came from */
  sources: Record<ConfigKey, ConfigSource>;
}

export interface ConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Config file path (default: getConfigPath(env)) */
  configPath?: string;
}

interface ConfigFile {
  host?: string;
  port?: string | number;
  user?: string;
}

export const DEFAULT_SSH_PORT = '29418';

const CONFIG_KEYS: readonly ConfigKey[] = ['host', 'port', 'user'];

const ENV_VARS: Record<ConfigKey, string> = {
  host: 'GERRIT_HOST',
  port: 'GERRIT_PORT',
  user: 'GERRIT_USER',
};

const getConfigValidator = createLazyValidator<ConfigFile>('gerrit-config');

// ────────────────────────────────────────────────────────────────
// Paths
// ────────────────────────────────────────────────────────────────

/**
 * Path of the persisted config file. GERRIT_REVIEW_PARSER_CONFIG overrides
 * the default location.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return (
    env.GERRIT_REVIEW_PARSER_CONFIG ||
    join(homedir(), '.config', 'gerrit-review-parser', 'config.json')
  );
}

// ────────────────────────────────────────────────────────────────
// Providers
// ────────────────────────────────────────────────────────────────

export function envProvider(env: NodeJS.ProcessEnv): ConfigProvider {
  return {
    source: 'env',
    load() {
      const values: Partial<GerritConfig> = {};
      for (const key of CONFIG_KEYS) {
        const value = env[ENV_VARS[key]]?.trim();
        if (value) {
          values[key] = value;
        }
      }
      return values;
    },
  };
}

/**
 * Read the config file.
 *
 * Behavior:
 * - Missing file → no values
 * - Invalid JSON or schema violation → throws ConfigError
 */
export function fileProvider(configPath: string): ConfigProvider {
  return {
    source: 'file',
    load() {
      if (!existsSync(configPath)) {
        return {};
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(
          `Failed to parse config file at ${configPath}: ${errorMessage(err)}`,
          { cause: err }
        );
      }

      const validate = getConfigValidator();
      if (!validate(parsed)) {
        throw new ConfigError(
          `Config validation failed for ${configPath}: ${formatSchemaErrors(validate.errors)}`
        );
      }

      const values: Partial<GerritConfig> = {};
      if (parsed.host) values.host = parsed.host;
      if (parsed.port !== undefined && parsed.port !== '') values.port = String(parsed.port);
      if (parsed.user) values.user = parsed.user;
      return values;
    },
  };
}

export function defaultsProvider(): ConfigProvider {
  return {
    source: 'default',
    load: () => ({ port: DEFAULT_SSH_PORT }),
  };
}

// ────────────────────────────────────────────────────────────────
// Public API
// ────────────────────────────────────────────────────────────────

/**
 * Resolve each config value from the first provider that has it.
 *
 * @throws ConfigError when host or user is not configured anywhere, or the
 *   config file is invalid
 *
 * @example
 * ```typescript
 * const { config, sources } = resolveGerritConfig();
 * console.log(`${config.host} (from ${sources.host})`);
 * ```
 */
export function resolveGerritConfig(options: ConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? getConfigPath(env);
  const layers = [envProvider(env), fileProvider(configPath), defaultsProvider()].map(
    (provider) => ({ source: provider.source, values: provider.load() })
  );

  const lookup = (key: ConfigKey): { value: string; source: ConfigSource } | undefined => {
    for (const layer of layers) {
      const value = layer.values[key];
      if (value !== undefined) {
        return { value, source: layer.source };
      }
    }
    return undefined;
  };

  const host = lookup('host');
  const port = lookup('port');
  const user = lookup('user');

  if (!host || !port || !user) {
    const missing = CONFIG_KEYS.filter((key) => lookup(key) === undefined).map((key) => ENV_VARS[key]);
    throw new ConfigError(
      `No configuration found for ${missing.join(', ')}. ` +
      `Please run 'gerrit-review-parser setup' or set environment variables ` +
      `GERRIT_HOST, GERRIT_PORT, GERRIT_USER.\n` +
      `Expected config file: ${configPath}`
    );
  }

  return {
    config: { host: host.value, port: port.value, user: user.value },
    sources: { host: host.source, port: port.source, user: user.source },
  };
}

/**
 * Load the effective connection config.
 */
export function loadGerritConfig(options: ConfigOptions = {}): GerritConfig {
  return resolveGerritConfig(options).config;
}

/**
 * Save config to the config file, creating its directory if needed.
 *
 * @returns Path the config was written to
 */
export function saveGerritConfig(config: GerritConfig, options: ConfigOptions = {}): string {
  const configPath = options.configPath ?? getConfigPath(options.env ?? process.env);
  mkdirSync(dirname(configPath), { recursive: true });

  const data: ConfigFile = { host: config.host, port: config.port, user: config.user };
  writeFileSync(configPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  return configPath;
}

/**
 * Check an SSH port entered by the user.
 *
 * @returns An error message, or null when the port is valid
 */
export function validatePort(port: string): string | null {
  const trimmed = port.trim();
  if (trimmed === '') {
    return 'Port cannot be empty';
  }
  if (!/^\d+$/.test(trimmed)) {
    return 'Port must be a valid number';
  }
  const value = parseInt(trimmed, 10);
  if (value < 1 || value > 65535) {
    return 'Port must be between 1 and 65535';
  }
  return null;
}
