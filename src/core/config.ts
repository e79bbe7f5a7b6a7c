import os from 'os';
import { cosmiconfig } from 'cosmiconfig';
import { ConfigError } from './errors.js';
import { expandString, resolveEnv } from './env.js';
import type { LookupResult } from './env.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { LinkConfig } from './types.js';

export type DotsyncConfig = {
  inheritEnv: string[];
  env: Record<string, string>;
  link: LinkConfig;
  exclude: string[];
};

export const DEFAULT_LINK_CONFIG: LinkConfig = {
  fromDir: '~/code/dotfiles',
  toDir: '~',
  backupDir: '~/backup',
};

export const DEFAULT_CONFIG: DotsyncConfig = {
  inheritEnv: ['HOME', 'USER'],
  env: {},
  link: DEFAULT_LINK_CONFIG,
  exclude: ['.git'],
};

/** A fresh copy of the defaults, safe for the caller to mutate. */
export function defaultConfig(): DotsyncConfig {
  return {
    inheritEnv: [...DEFAULT_CONFIG.inheritEnv],
    env: { ...DEFAULT_CONFIG.env },
    link: { ...DEFAULT_LINK_CONFIG },
    exclude: [...DEFAULT_CONFIG.exclude],
  };
}

export type LoadConfigOptions = {
  cwd?: string;
  configPath?: string;
};

export type LoadedConfig = {
  config: DotsyncConfig;
  filepath: string | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, field: string, filepath: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(filepath, `'${field}' must be a list of strings`);
  }
  return value;
}

function stringMap(value: unknown, field: string, filepath: string): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ConfigError(filepath, `'${field}' must be a table of strings`);
  const out: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string') throw new ConfigError(filepath, `'${field}.${key}' must be a string`);
    out[key] = v;
  }
  return out;
}

/** Validate a raw config object and merge it over the defaults. */
export function parseConfig(raw: unknown, filepath: string): DotsyncConfig {
  if (raw === undefined || raw === null) return defaultConfig();
  if (!isRecord(raw)) throw new ConfigError(filepath, 'expected a table at the top level');

  const link: Record<string, string> = stringMap(raw.link, 'link', filepath) ?? {};
  for (const key of Object.keys(link)) {
    if (key !== 'fromDir' && key !== 'toDir' && key !== 'backupDir') {
      throw new ConfigError(filepath, `unknown key 'link.${key}'`);
    }
  }

  const defaults = defaultConfig();
  return {
    inheritEnv: stringList(raw.inheritEnv, 'inheritEnv', filepath) ?? defaults.inheritEnv,
    env: stringMap(raw.env, 'env', filepath) ?? defaults.env,
    link: {
      fromDir: link.fromDir ?? defaults.link.fromDir,
      toDir: link.toDir ?? defaults.link.toDir,
      backupDir: link.backupDir ?? defaults.link.backupDir,
    },
    exclude: stringList(raw.exclude, 'exclude', filepath) ?? defaults.exclude,
  };
}

export async function loadConfig(opts: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { cwd = process.cwd(), configPath } = opts;
  const explorer = cosmiconfig('dotsync', {
    searchPlaces: [
      'dotsync.config.json',
      '.dotsyncrc',
      '.dotsyncrc.json',
      '.dotsyncrc.yaml',
      '.dotsyncrc.yml',
      'package.json',
    ],
  });

  const result = configPath ? await explorer.load(configPath) : await explorer.search(cwd);
  if (!result || result.isEmpty) return { config: defaultConfig(), filepath: result?.filepath ?? null };
  const raw: unknown = result.config;
  return { config: parseConfig(raw, result.filepath), filepath: result.filepath };
}

export type LinkOverrides = Partial<LinkConfig>;

export type PrepareOptions = {
  processEnv?: Readonly<Record<string, string | undefined>>;
  homeDir?: string;
  logger?: Logger;
};

export type PreparedRun = {
  env: Record<string, string>;
  link: LinkConfig;
};

/** Expand `~` and env references in each of the three link paths. */
export function resolveLinkConfig(link: LinkConfig, env: Readonly<Record<string, string>>, homeDir: string): LinkConfig {
  const expand = (input: string) => expandString(input, (name): LookupResult => {
    const value = env[name];
    return value === undefined ? { kind: 'missing' } : { kind: 'value', value };
  }, { homeDir }).value;
  return {
    fromDir: expand(link.fromDir),
    toDir: expand(link.toDir),
    backupDir: expand(link.backupDir),
  };
}

/** Resolve the env, then the link paths, with CLI overrides taking precedence. */
export function prepareLinkConfig(config: DotsyncConfig, overrides: LinkOverrides = {}, opts: PrepareOptions = {}): PreparedRun {
  const homeDir = opts.homeDir ?? os.homedir();
  const logger = opts.logger ?? silentLogger;
  const env = resolveEnv({
    inherit: config.inheritEnv,
    config: config.env,
    processEnv: opts.processEnv,
    homeDir,
    logger,
  });
  const link: LinkConfig = {
    fromDir: overrides.fromDir ?? config.link.fromDir,
    toDir: overrides.toDir ?? config.link.toDir,
    backupDir: overrides.backupDir ?? config.link.backupDir,
  };
  return { env, link: resolveLinkConfig(link, env, homeDir) };
}
