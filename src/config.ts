/**
 * Site configuration.
 *
 * Loads an optional JSON file (mdfolio.config.json in the working directory,
 * or the path in MDFOLIO_CONFIG). Command-line flags override the file.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { ConfigError } from './errors.js';
import { DEFAULT_TEMPLATE_PATH } from './template.js';

export const CONFIG_FILE_NAME = 'mdfolio.config.json';

/**
 * Resolved configuration
 */
export interface SiteConfig {
  /** Directory holding the markdown sources */
  rootDir: string;
  /** Directory the HTML pages are written to */
  outDir: string;
  /** HTML page template */
  templatePath: string;
  /** Preview server port */
  port: number;
}

type ConfigFile = Partial<SiteConfig>;

const DEFAULTS: SiteConfig = {
  rootDir: '.',
  outDir: 'site',
  templatePath: DEFAULT_TEMPLATE_PATH,
  port: 3000
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the shape of a parsed config file, keeping only known keys
 */
function validateConfigFile(raw: unknown, configPath: string): ConfigFile {
  if (!isRecord(raw)) {
    throw new ConfigError(`${configPath}: expected a JSON object`);
  }

  const config: ConfigFile = {};
  for (const key of ['rootDir', 'outDir', 'templatePath'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value === '') {
      throw new ConfigError(`${configPath}: "${key}" must be a non-empty string`);
    }
    config[key] = value;
  }

  if (raw.port !== undefined) {
    if (typeof raw.port !== 'number' || !Number.isInteger(raw.port) || raw.port <= 0) {
      throw new ConfigError(`${configPath}: "port" must be a positive integer`);
    }
    config.port = raw.port;
  }

  return config;
}

/**
 * Read the config file, if there is one. Relative paths inside it are
 * resolved against the file's own directory.
 */
export function readConfigFile(configPath: string): ConfigFile {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(configPath);
  } catch (err) {
    throw new ConfigError(`Failed to read config ${configPath}: ${err}`);
  }

  const config = validateConfigFile(raw, configPath);
  const baseDir = path.dirname(configPath);
  for (const key of ['rootDir', 'outDir', 'templatePath'] as const) {
    const value = config[key];
    if (value !== undefined) {
      config[key] = path.resolve(baseDir, value);
    }
  }
  return config;
}

/**
 * Parse a port from text, rejecting anything but a positive integer
 */
export function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigError(`${source}: invalid port "${value}"`);
  }
  return port;
}

/**
 * Build the configuration: defaults, then the config file, then PORT, then
 * the explicit overrides (normally command-line flags).
 */
export function loadConfig(
  overrides: Partial<SiteConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): SiteConfig {
  const configPath = env.MDFOLIO_CONFIG
    ? path.resolve(cwd, env.MDFOLIO_CONFIG)
    : path.join(cwd, CONFIG_FILE_NAME);
  const fromFile = readConfigFile(configPath);

  const config: SiteConfig = { ...DEFAULTS, ...fromFile };
  if (env.PORT) {
    config.port = parsePort(env.PORT, 'PORT');
  }
  config.rootDir = overrides.rootDir ?? config.rootDir;
  config.outDir = overrides.outDir ?? config.outDir;
  config.templatePath = overrides.templatePath ?? config.templatePath;
  config.port = overrides.port ?? config.port;

  config.rootDir = path.resolve(cwd, config.rootDir);
  config.outDir = path.resolve(cwd, config.outDir);
  config.templatePath = path.resolve(cwd, config.templatePath);
  return config;
}
