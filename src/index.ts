export type {
  LinkConfig,
  LinkOutcome,
  LinkPlan,
  LinkTask,
  SourceEntry,
  SourceKind,
  SyncSummary,
} from './core/types.js';

export { expandString, resolveEnv } from './core/env.js';
export type { Expansion, Lookup, LookupResult, ResolveEnvOptions } from './core/env.js';

export { synchronize, resolveDirectory, ensureParentDir } from './core/sync.js';
export type { SyncOptions } from './core/sync.js';
export { ensureLink, inspectTarget } from './core/link.js';
export { displace } from './core/backup.js';
export { walkSourceEntries } from './core/walk.js';
export { buildLinkPlan } from './core/plan.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_LINK_CONFIG,
  defaultConfig,
  loadConfig,
  parseConfig,
  prepareLinkConfig,
  resolveLinkConfig,
} from './core/config.js';
export type { DotsyncConfig, LinkOverrides } from './core/config.js';

export * from './core/errors.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
