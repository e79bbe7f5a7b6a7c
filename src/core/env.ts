import os from 'os';
import { EnvLookupError, UnresolvedCycleError } from './errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export type LookupResult =
  | { kind: 'value'; value: string }
  | { kind: 'defer' }
  | { kind: 'missing' };

export type Lookup = (name: string) => LookupResult;

export type Expansion = {
  value: string;
  deferred: string[];
};

export type ExpandOptions = {
  /** Expand a leading `~` to this directory. Left untouched when omitted. */
  homeDir?: string;
};

const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_]/;

function expandTilde(input: string, homeDir: string | undefined): string {
  if (homeDir === undefined) return input;
  if (input === '~') return homeDir;
  if (input.startsWith('~/')) return homeDir + input.slice(1);
  return input;
}

/**
 * Expand `$NAME` and `${NAME}` references in `input` through `lookup`.
 * Deferred references are kept verbatim; substituted text is never rescanned.
 */
export function expandString(input: string, lookup: Lookup, opts: ExpandOptions = {}): Expansion {
  const source = expandTilde(input, opts.homeDir);
  const deferred: string[] = [];
  let out = '';
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);
    if (ch !== '$') {
      out += ch;
      i += 1;
      continue;
    }

    let name: string | null = null;
    let end = i + 1;
    if (source.charAt(i + 1) === '{') {
      const close = source.indexOf('}', i + 2);
      const candidate = close === -1 ? '' : source.slice(i + 2, close);
      if (candidate.length > 0 && isName(candidate)) {
        name = candidate;
        end = close + 1;
      }
    } else {
      let j = i + 1;
      if (j < source.length && NAME_START.test(source.charAt(j))) {
        while (j < source.length && NAME_CHAR.test(source.charAt(j))) j += 1;
        name = source.slice(i + 1, j);
        end = j;
      }
    }

    if (name === null) {
      out += '$';
      i += 1;
      continue;
    }

    const result = lookup(name);
    if (result.kind === 'missing') throw new EnvLookupError(name);
    if (result.kind === 'defer') {
      deferred.push(name);
      out += source.slice(i, end);
    } else {
      out += result.value;
    }
    i = end;
  }

  return { value: out, deferred };
}

function isName(candidate: string): boolean {
  if (!NAME_START.test(candidate.charAt(0))) return false;
  for (const ch of candidate) {
    if (!NAME_CHAR.test(ch)) return false;
  }
  return true;
}

export type ResolveEnvOptions = {
  /** Names copied from `processEnv` when present. */
  inherit?: readonly string[];
  config?: Readonly<Record<string, string>>;
  processEnv?: Readonly<Record<string, string | undefined>>;
  homeDir?: string;
  logger?: Logger;
};

/**
 * Resolve a config env mapping whose values may reference inherited variables
 * and each other, iterating until every key is expanded.
 */
export function resolveEnv(opts: ResolveEnvOptions = {}): Record<string, string> {
  const processEnv = opts.processEnv ?? process.env;
  const homeDir = opts.homeDir ?? os.homedir();
  const config = opts.config ?? {};
  const logger = opts.logger ?? silentLogger;

  const base = new Map<string, string>();
  for (const name of opts.inherit ?? []) {
    const value = processEnv[name];
    if (value !== undefined) base.set(name, value);
  }

  const configKeys = new Set(Object.keys(config));
  const resolved = new Map<string, string>();
  let queue: string[] = [];

  for (const [key, raw] of Object.entries(config)) {
    const { value, deferred } = expandString(raw, (name) => {
      const inherited = base.get(name);
      if (inherited !== undefined) return { kind: 'value', value: inherited };
      if (configKeys.has(name)) return { kind: 'defer' };
      return { kind: 'missing' };
    }, { homeDir });
    if (deferred.length === 0) resolved.set(key, value);
    else queue.push(key);
  }

  logger.debug('Unresolved env after first pass', { keys: queue.join(',') });

  while (queue.length > 0) {
    const pending = new Set(queue);
    const snapshot = new Map(resolved);
    const remaining: string[] = [];

    for (const key of queue) {
      const raw = config[key] ?? '';
      const { value, deferred } = expandString(raw, (name) => {
        const inherited = base.get(name);
        if (inherited !== undefined) return { kind: 'value', value: inherited };
        if (pending.has(name)) return { kind: 'defer' };
        const known = snapshot.get(name);
        if (known !== undefined) return { kind: 'value', value: known };
        return { kind: 'missing' };
      }, { homeDir });
      if (deferred.length === 0) resolved.set(key, value);
      else remaining.push(key);
    }

    if (remaining.length === queue.length) throw new UnresolvedCycleError(remaining);
    logger.debug('Env resolution pass', { resolved: queue.length - remaining.length, remaining: remaining.length });
    queue = remaining;
  }

  const env: Record<string, string> = {};
  for (const [key, value] of base) env[key] = value;
  for (const [key, value] of resolved) env[key] = value;
  return env;
}
