export type LinkConfig = {
  fromDir: string;
  toDir: string;
  backupDir: string;
};

export type SourceKind = 'file' | 'symlink' | 'other';

export type SourceEntry = {
  /** Path below the source root, the key shared by source, target and backup trees. */
  relativePath: string;
  absolutePath: string;
  kind: SourceKind;
};

export type LinkOutcome = 'unchanged' | 'linked' | 'relinked' | 'replaced-broken' | 'backed-up';

export type LinkTask =
  | { type: 'noop'; source: string; target: string }
  | { type: 'link'; source: string; target: string }
  | { type: 'relink'; source: string; target: string; currentTarget: string }
  | { type: 'replace-broken'; source: string; target: string; currentTarget: string }
  | { type: 'backup'; source: string; target: string; existingKind: 'file' | 'dir' | 'other'; backupPath: string }
  | { type: 'clear-parent'; source: string; target: string; ancestor: string; ancestorKind: 'file' | 'symlink' | 'other' };

export type BackupTask = Extract<LinkTask, { type: 'backup' | 'clear-parent' }>;

export type LinkPlan = {
  config: LinkConfig;
  tasks: LinkTask[];
  changes: LinkTask[];
  backups: BackupTask[];
};

export type SyncSummary = {
  linked: number;
  unchanged: number;
  relinked: number;
  backedUp: number;
  removedLinks: number;
  backupDir: string;
  backupKept: boolean;
};
