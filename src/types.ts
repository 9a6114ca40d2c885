export const TOOLS = ['claude', 'codex', 'gemini'] as const;

export type Tool = (typeof TOOLS)[number];

/**
 * Fixed per-tool table; every tool must have an entry
 */
export type ToolTable<T> = Record<Tool, T>;

export type SkillOrigin = 'global' | 'local';

export type SyncState = 'synced' | 'modified' | 'missing' | 'orphan';

export type ConflictStrategy = 'error' | 'prefer-source' | 'prefer-tool';

/**
 * Tri-state answer from an interactive confirmation
 */
export type Decision = 'confirm' | 'decline' | 'cancel';

export interface SkillMetadata {
  name: string;
  description: string;
}

/**
 * Canonical skill template as found in a configured source root
 */
export interface SourceSkill extends SkillMetadata {
  sourceRoot: string;
  skillDir: string;
  skillPath: string;
  /** Raw, unrendered template */
  contents: string;
  /** Epoch milliseconds */
  modified: number;
}

/**
 * Skill copy found in a tool's global or project-local skills directory
 */
export interface InstalledSkill extends SkillMetadata {
  tool: Tool;
  origin: SkillOrigin;
  skillDir: string;
  skillPath: string;
  contents: string;
  modified: number;
}

export interface SourceConflict {
  name: string;
  /** Colliding skill directories; the first one is kept */
  paths: string[];
}

export interface Catalog {
  sources: Map<string, SourceSkill>;
  installs: ToolTable<Map<string, InstalledSkill>>;
  locals: ToolTable<Map<string, InstalledSkill>>;
  conflicts: SourceConflict[];
}

export interface ToolStatus {
  tool: Tool;
  state: SyncState;
}

export interface SkillEntry {
  name: string;
  source?: SourceSkill;
  statuses: ToolStatus[];
}

export type SyncAction =
  | { kind: 'push'; toTools: Tool[] }
  | { kind: 'pull'; fromTool: Tool }
  | { kind: 'pull-and-push'; fromTool: Tool; toTools: Tool[] };

export interface SyncPlan {
  name: string;
  source: SourceSkill;
  /** Installed copies that differ from the rendered source, in tool order */
  differing: InstalledSkill[];
  action: SyncAction;
}

export interface SyncConflict {
  name: string;
  tools: Tool[];
  reason: 'divergent' | 'invalid';
  message: string;
}

export interface SyncOutcome {
  name: string;
  pushed: Tool[];
  pulledFrom?: Tool;
}

export type PushStatus = 'new' | 'unchanged' | 'modified';

export interface PushItem {
  skill: SourceSkill;
  tool: Tool;
  status: PushStatus;
  rendered: string;
  installed?: InstalledSkill;
}

export interface PullVariant {
  skill: InstalledSkill;
  /** No source skill exists for this name */
  orphan: boolean;
}

export interface PullPlan {
  name: string;
  source?: SourceSkill;
  variants: PullVariant[];
}

export type VariantChoice =
  | { kind: 'select'; index: number }
  | { kind: 'skip' }
  | { kind: 'diff'; left: number; right: number }
  | { kind: 'cancel' };

export interface SkillsConfig {
  sources: string[];
}

export interface PushOptions {
  tool: Tool | 'all';
  all?: boolean;
  dryRun?: boolean;
  force?: boolean;
  yes?: boolean;
}

export interface PullOptions {
  to?: string;
}

export interface SyncOptions {
  preferSource?: boolean;
  preferTool?: boolean;
  dryRun?: boolean;
}

export interface UnloadOptions {
  tool: Tool | 'all';
  dryRun?: boolean;
  force?: boolean;
}

export interface MoveOptions {
  dryRun?: boolean;
  force?: boolean;
}

export interface PromoteOptions {
  /** 'all' leaves the choice to whichever project directory holds the skill */
  tool: Tool | 'all';
  dryRun?: boolean;
  force?: boolean;
}
