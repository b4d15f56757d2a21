import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Plan Input Types
// ─────────────────────────────────────────────────────────────

export const ActionKind = z.enum(['no-op', 'create', 'update', 'delete', 'replace']);
export type ActionKind = z.infer<typeof ActionKind>;

export const ResourceChangeInput = z.object({
  address: z.string().min(1),
  type: z.string().min(1),
  name: z.string().optional(),
  modulePath: z.string().default(''),
  action: ActionKind,
  before: z.unknown().optional(),
  after: z.unknown().optional(),
  dependsOn: z.array(z.string()).default([]),
  // Paths the plan reports as forcing replacement, e.g. ["network_interface", 0, "subnet_id"]
  replacePaths: z.array(z.array(z.union([z.string(), z.number()]))).optional(),
  // Plan-declared sensitivity trees (true leaves mark sensitive values)
  beforeSensitive: z.unknown().optional(),
  afterSensitive: z.unknown().optional(),
});
export type ResourceChangeInput = z.infer<typeof ResourceChangeInput>;

export const OutputChangeInput = z.object({
  name: z.string().min(1),
  action: ActionKind,
  before: z.unknown().optional(),
  after: z.unknown().optional(),
  beforeSensitive: z.unknown().optional(),
  afterSensitive: z.unknown().optional(),
});
export type OutputChangeInput = z.infer<typeof OutputChangeInput>;

export const PlanInput = z.object({
  resourceChanges: z.array(ResourceChangeInput),
  outputChanges: z.array(OutputChangeInput).default([]),
  // Precomputed forward-dependency map: address -> addresses it depends on
  dependencies: z.record(z.string(), z.array(z.string())).default({}),
});
export type PlanInput = z.infer<typeof PlanInput>;

// ─────────────────────────────────────────────────────────────
// Sensitivity Types
// ─────────────────────────────────────────────────────────────

export type SensitivityRule =
  | { readonly kind: 'resource'; readonly resourceType: string }
  | { readonly kind: 'property'; readonly resourceType: string; readonly property: string };

// ─────────────────────────────────────────────────────────────
// Diff Types
// ─────────────────────────────────────────────────────────────

export type PropertyChangeAction = 'add' | 'remove' | 'update';

export interface PropertyChange {
  path: string[];
  before: unknown;
  after: unknown;
  action: PropertyChangeAction;
  sensitive: boolean;
  triggersReplacement: boolean;
  size: number; // estimated bytes of before + after
}

export interface PropertyChangeSet {
  changes: PropertyChange[];
  count: number;
  totalSize: number;
  truncated: boolean;
}

export interface DiffLimits {
  maxDepth: number;
  maxProperties: number;
  maxTotalBytes: number;
}

// ─────────────────────────────────────────────────────────────
// Risk Types
// ─────────────────────────────────────────────────────────────

export const RiskLevel = z.enum(['low', 'medium', 'high', 'critical']);
export type RiskLevel = z.infer<typeof RiskLevel>;

const RISK_ORDER: Record<RiskLevel, number> = { low: 0, medium: 1, high: 2, critical: 3 };

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return RISK_ORDER[a] - RISK_ORDER[b];
}

export function maxRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return compareRisk(a, b) >= 0 ? a : b;
}

// ─────────────────────────────────────────────────────────────
// Dependency Types
// ─────────────────────────────────────────────────────────────

export interface DependencyInfo {
  dependsOn: string[];
  usedBy: string[];
  partial: boolean;
}

/** address -> addresses that declare it as a dependency */
export type ReverseIndex = ReadonlyMap<string, readonly string[]>;

// ─────────────────────────────────────────────────────────────
// Analysis & Report Types
// ─────────────────────────────────────────────────────────────

export interface CollapsibleValue {
  summary: string;
  detail: string;
  expandByDefault: boolean;
}

export interface ResourceDisplay {
  /** Property diff for most actions; reasons and replacement hints for replace */
  detail: CollapsibleValue;
  dependencies: CollapsibleValue;
}

export interface ResourceAnalysis {
  address: string;
  type: string;
  name?: string;
  modulePath: string;
  action: ActionKind;
  provider: string;
  propertyChanges: PropertyChangeSet;
  riskLevel: RiskLevel;
  dangerous: boolean;
  reasons: string[];
  /** Registered sensitive properties this change touches, sorted */
  dangerProperties: string[];
  replacementHints: string[];
  dependencies: DependencyInfo;
  display: ResourceDisplay;
}

export type AnalysisStage = 'diff' | 'risk' | 'dependency' | 'sensitivity';

export interface AnalysisError {
  address: string;
  stage: AnalysisStage;
  message: string;
  cause?: unknown;
}

export interface ChangeStatistics {
  create: number;
  update: number;
  delete: number;
  replace: number;
  noOp: number;
  total: number;
  highRiskCount: number;
  dangerousCount: number;
}

export interface GroupingResult {
  groups: ReadonlyMap<string, readonly number[]>;
  applied: boolean;
}

/** Values are null when the output is sensitive */
export interface OutputChange {
  name: string;
  action: ActionKind;
  sensitive: boolean;
  before: unknown;
  after: unknown;
}

export interface AnalysisReport {
  readonly analyses: readonly ResourceAnalysis[];
  readonly outputs: readonly OutputChange[];
  readonly statistics: ChangeStatistics;
  readonly errors: readonly AnalysisError[];
  readonly grouping: GroupingResult;
}

// ─────────────────────────────────────────────────────────────
// Config Types
// ─────────────────────────────────────────────────────────────

// Rule entries stay loose here; the sensitivity index validates each one so a
// single bad entry never fails the whole config.
const SensitiveResourceEntry = z.object({
  resourceType: z.string().default(''),
});

const SensitivePropertyEntry = z.object({
  resourceType: z.string().default(''),
  property: z.string().default(''),
});

export const PlanwardenConfig = z.object({
  version: z.string().default('1'),

  sensitiveResources: z.array(SensitiveResourceEntry).default([]),
  sensitiveProperties: z.array(SensitivePropertyEntry).default([]),

  grouping: z.object({
    enabled: z.boolean().default(true),
    threshold: z.number().int().min(1).default(10),
  }).default({}),

  limits: z.object({
    maxDepth: z.number().int().min(1).default(5),
    maxProperties: z.number().int().min(1).default(100),
    maxTotalBytes: z.number().int().min(1).default(10 * 1024 * 1024),
    maxDependencies: z.number().int().min(1).default(100),
  }).default({}),

  disclosure: z.object({
    expandAll: z.boolean().default(false),
    maxDetailLength: z.number().int().min(1).default(500),
  }).default({}),

  // Worker pool size; defaults to the available CPUs
  concurrency: z.number().int().min(1).optional(),
});
export type PlanwardenConfig = z.infer<typeof PlanwardenConfig>;
