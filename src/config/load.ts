import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createLogger } from '../logger.js';
import { ConfigError, errMsg } from '../utils/error.js';
import { AppConfigSchema, formatConfigError } from './schema.js';
import type { AppConfig } from './schema.js';

const log = createLogger('Config');

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `${VAR}` references in every string of a parsed YAML tree.
 * Throws ConfigError naming the first variable that is not set.
 */
export function resolveEnvReferences(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REF, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Environment variable ${name} is referenced but not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((v) => resolveEnvReferences(v, env));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, resolveEnvReferences(v, env)]),
    );
  }
  return value;
}

/** Parse and validate config.yaml text. */
export function parseConfig(
  raw: string,
  file = 'config.yaml',
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`${file} is not valid YAML: ${errMsg(err)}`);
  }
  if (!parsed || typeof parsed !== 'object') {
    throw new ConfigError(`${file} is not a valid YAML object`);
  }

  const result = AppConfigSchema.safeParse(resolveEnvReferences(parsed, env));
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error, file));
  }
  return result.data;
}

/** Default location: CONFIG_PATH env var, else ./config.yaml. */
export function defaultConfigPath(): string {
  return resolve(process.env.CONFIG_PATH ?? 'config.yaml');
}

export function loadConfig(
  path: string = defaultConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errMsg(err)}`);
  }
  const config = parseConfig(raw, path, env);
  log.debug(`Loaded ${path}: ${config.meters.length} meter(s), ${config.exporters.length} exporter(s)`);
  return config;
}
