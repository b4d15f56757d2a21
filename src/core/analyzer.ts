/**
 * Plan Analyzer - Orchestration
 *
 * Runs every resource change through the same pipeline:
 *
 *   diff → sensitivity tagging → risk → dependencies → disclosure
 *
 * Resources are independent. A bounded pool of async workers pulls them in
 * plan order and writes each outcome into its own pre-sized slot, so the
 * report keeps plan order without any locking. A failing stage never stops a
 * sibling: it becomes an AnalysisError and the resource's risk is raised.
 */

import { availableParallelism } from 'os';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type {
  ActionKind,
  AnalysisError,
  AnalysisReport,
  AnalysisStage,
  ChangeStatistics,
  DependencyInfo,
  OutputChangeInput,
  DiffLimits,
  GroupingResult,
  PropertyChangeSet,
  ResourceAnalysis,
  ResourceChangeInput,
  ReverseIndex,
  RiskLevel,
} from '../types.js';
import { compareRisk, maxRisk } from '../types.js';
import type { SensitivityIndex } from './sensitivity-index.js';
import { DEFAULT_DIFF_LIMITS, diffValues, isMap } from './property-diff.js';
import { assessRisk } from './risk-assessor.js';
import {
  DEFAULT_MAX_DEPENDENCIES,
  buildReverseIndex,
  emptyDependencyInfo,
  extractDependencies,
  type ForwardEdges,
} from './dependency-extractor.js';
import {
  DEFAULT_GROUP_THRESHOLD,
  groupByProvider,
  underscorePrefixResolver,
  type ProviderResolver,
} from './grouping.js';
import {
  DEFAULT_DISCLOSURE_OPTIONS,
  dependenciesValue,
  propertyChangesValue,
  reasonsValue,
  shouldExpand,
  type DisclosureOptions,
} from './disclosure.js';
import { CancelledError, errorMessage } from './errors.js';
import { analyzeOutputChanges, hasTrueLeaf } from './output-changes.js';

// ─────────────────────────────────────────────────────────────
// Analyzer Configuration
// ─────────────────────────────────────────────────────────────

export interface AnalyzerConfig {
  concurrency: number;
  limits: DiffLimits;
  maxDependencies: number;
  grouping: { enabled: boolean; threshold: number };
  disclosure: DisclosureOptions;
  resolver: ProviderResolver;
}

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  concurrency: availableParallelism(),
  limits: DEFAULT_DIFF_LIMITS,
  maxDependencies: DEFAULT_MAX_DEPENDENCIES,
  grouping: { enabled: true, threshold: DEFAULT_GROUP_THRESHOLD },
  disclosure: DEFAULT_DISCLOSURE_OPTIONS,
  resolver: underscorePrefixResolver,
};

export interface AnalysisProgress {
  onStart?: (total: number) => void;
  onResourceStart?: (address: string) => void;
  onResourceComplete?: (analysis: ResourceAnalysis) => void;
  onResourceError?: (error: AnalysisError) => void;
}

export interface PlanToAnalyze {
  resourceChanges: readonly ResourceChangeInput[];
  dependencies?: ForwardEdges;
  outputChanges?: readonly OutputChangeInput[];
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

interface ResourceOutcome {
  analysis: ResourceAnalysis;
  errors: AnalysisError[];
}

interface PipelineContext {
  index: SensitivityIndex;
  forwardEdges: ForwardEdges;
  reverseIndex: ReverseIndex;
  config: AnalyzerConfig;
}

// ─────────────────────────────────────────────────────────────
// Plan Analyzer
// ─────────────────────────────────────────────────────────────

export class PlanAnalyzer {
  private config: AnalyzerConfig;
  private progress: AnalysisProgress;

  constructor(config: Partial<AnalyzerConfig> = {}, progress: AnalysisProgress = {}) {
    this.config = { ...DEFAULT_ANALYZER_CONFIG, ...config };
    if (!Number.isFinite(this.config.concurrency) || this.config.concurrency < 1) {
      this.config.concurrency = DEFAULT_ANALYZER_CONFIG.concurrency;
    }
    this.progress = progress;
  }

  /**
   * Analyze every resource change of a plan. Resolves with a frozen report,
   * or rejects with CancelledError (carrying the partial report) when the
   * signal aborts before all resources were taken.
   */
  async analyze(
    plan: PlanToAnalyze,
    index: SensitivityIndex,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisReport> {
    const { signal } = options;
    const changes = plan.resourceChanges;
    const forwardEdges = plan.dependencies ?? {};
    const context: PipelineContext = {
      index,
      forwardEdges,
      reverseIndex: buildReverseIndex(changes, forwardEdges),
      config: this.config,
    };

    this.progress.onStart?.(changes.length);

    const slots = new Array<ResourceOutcome | undefined>(changes.length).fill(undefined);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < changes.length) {
        if (signal?.aborted) return;
        const slot = next++;
        const change = changes[slot];

        this.progress.onResourceStart?.(change.address);
        const outcome = analyzeResource(change, context);
        slots[slot] = outcome;

        for (const error of outcome.errors) this.progress.onResourceError?.(error);
        this.progress.onResourceComplete?.(outcome.analysis);

        // Let abort events land between resources
        await yieldToEventLoop();
      }
    };

    const poolSize = Math.max(1, Math.min(Math.floor(this.config.concurrency), changes.length));
    await Promise.all(Array.from({ length: poolSize }, () => worker()));

    const report = this.assemble(slots, plan.outputChanges ?? []);
    if (signal?.aborted && report.analyses.length < changes.length) {
      throw new CancelledError(report);
    }
    return report;
  }

  private assemble(
    slots: Array<ResourceOutcome | undefined>,
    outputChanges: readonly OutputChangeInput[]
  ): AnalysisReport {
    const analyses: ResourceAnalysis[] = [];
    const errors: AnalysisError[] = [];

    for (const outcome of slots) {
      if (!outcome) continue;
      analyses.push(outcome.analysis);
      errors.push(...outcome.errors);
    }

    const grouping: GroupingResult = this.config.grouping.enabled
      ? groupByProvider(analyses, this.config.grouping.threshold, this.config.resolver)
      : { groups: new Map(), applied: false };

    return Object.freeze({
      analyses: Object.freeze(analyses),
      outputs: Object.freeze(analyzeOutputChanges(outputChanges)),
      statistics: Object.freeze(calculateStatistics(analyses)),
      errors: Object.freeze(errors),
      grouping: Object.freeze(grouping),
    });
  }
}

export function analyzePlan(
  plan: PlanToAnalyze,
  index: SensitivityIndex,
  config: Partial<AnalyzerConfig> = {},
  options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
  return new PlanAnalyzer(config).analyze(plan, index, options);
}

// ─────────────────────────────────────────────────────────────
// Per-resource pipeline
// ─────────────────────────────────────────────────────────────

function analyzeResource(change: ResourceChangeInput, context: PipelineContext): ResourceOutcome {
  const { index, config } = context;
  const errors: AnalysisError[] = [];
  const fail = (stage: AnalysisStage, error: unknown): void => {
    errors.push({ address: change.address, stage, message: errorMessage(error), cause: error });
  };

  // Diff
  let changeSet: PropertyChangeSet = { changes: [], count: 0, totalSize: 0, truncated: false };
  try {
    const result = diffValues(change.before, change.after, config.limits);
    changeSet = result.changeSet;
    for (const diffError of result.errors) fail('diff', diffError);
  } catch (error) {
    fail('diff', error);
  }

  // Sensitivity tagging
  let dangerProperties: string[] = [];
  try {
    dangerProperties = tagSensitivity(change, changeSet, index);
  } catch (error) {
    // Unknown sensitivity: redact everything rather than risk a leak
    for (const pc of changeSet.changes) pc.sensitive = true;
    fail('sensitivity', error);
  }

  // Risk
  let riskLevel: RiskLevel = 'low';
  let reasons: string[] = [];
  try {
    const assessment = assessRisk(
      change.action,
      index.isSensitiveResource(change.type),
      dangerProperties.length
    );
    riskLevel = assessment.level;
    reasons = assessment.reasons;
  } catch (error) {
    fail('risk', error);
  }

  // Dependencies
  let dependencies: DependencyInfo = emptyDependencyInfo();
  try {
    dependencies = extractDependencies(
      change,
      context.forwardEdges,
      context.reverseIndex,
      config.maxDependencies
    );
  } catch (error) {
    fail('dependency', error);
  }

  // Any failed stage raises the level; a broken analysis must never read as low risk
  if (errors.length > 0) {
    riskLevel = maxRisk(riskLevel, 'high');
    for (const stage of new Set(errors.map((e) => e.stage))) {
      reasons.push(`incomplete analysis (${stage})`);
    }
  }

  const uniqueReasons = [...new Set(reasons)];
  const replacementHints = (change.replacePaths ?? []).map(formatReplacePath).filter((h) => h !== '');
  const expand = shouldExpand(riskLevel, changeSet, config.disclosure.expandAll);

  const analysis: ResourceAnalysis = {
    address: change.address,
    type: change.type,
    name: change.name,
    modulePath: change.modulePath,
    action: change.action,
    provider: config.resolver.resolve(change.type),
    propertyChanges: changeSet,
    riskLevel,
    dangerous: riskLevel !== 'low',
    reasons: uniqueReasons,
    dangerProperties,
    replacementHints,
    dependencies,
    display: {
      detail:
        change.action === 'replace'
          ? reasonsValue(uniqueReasons, replacementHints, expand, config.disclosure, dangerProperties)
          : propertyChangesValue(changeSet, expand, config.disclosure),
      dependencies: dependenciesValue(dependencies, expand, config.disclosure),
    },
  };

  return { analysis, errors };
}

/**
 * Mark changes as sensitive from config rules and plan-declared sensitivity.
 * Returns the registered sensitive properties the change touches, sorted.
 */
function tagSensitivity(
  change: ResourceChangeInput,
  changeSet: PropertyChangeSet,
  index: SensitivityIndex
): string[] {
  const touched = new Set<string>();
  const replacePaths = change.replacePaths ?? [];

  for (const pc of changeSet.changes) {
    const [property] = pc.path;
    let sensitive = false;

    if (property !== undefined) {
      if (index.isSensitiveProperty(change.type, property)) {
        sensitive = true;
        touched.add(property);
      }
    } else {
      // Root-level change (create/delete): redact if any sensitive property is inside
      sensitive = [pc.before, pc.after].some(
        (side) => isMap(side) && Object.keys(side).some((key) => index.isSensitiveProperty(change.type, key))
      );
    }

    if (
      !sensitive &&
      (containsSensitiveMark(change.beforeSensitive, pc.path) ||
        containsSensitiveMark(change.afterSensitive, pc.path))
    ) {
      sensitive = true;
    }

    pc.sensitive = sensitive;
    pc.triggersReplacement = replacePaths.some((rp) => pathsOverlap(pc.path, rp));
  }

  return [...touched].sort();
}

/** Walk a plan sensitivity tree along `path`; true if the value there is, or holds, a true leaf. */
function containsSensitiveMark(tree: unknown, path: readonly string[]): boolean {
  let node = tree;
  for (const key of path) {
    if (node === true) return true;
    if (!isMap(node)) return false;
    node = node[key];
  }
  return hasTrueLeaf(node);
}

/** One path is a component-wise prefix of the other */
function pathsOverlap(changePath: readonly string[], replacePath: ReadonlyArray<string | number>): boolean {
  const length = Math.min(changePath.length, replacePath.length);
  if (length === 0) return false;
  for (let i = 0; i < length; i++) {
    if (changePath[i] !== String(replacePath[i])) return false;
  }
  return true;
}

/** ["network_interface", 0, "subnet_id"] -> "network_interface[0].subnet_id" */
export function formatReplacePath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const part of path) {
    if (typeof part === 'number') {
      out += `[${part}]`;
    } else {
      out += out === '' ? part : `.${part}`;
    }
  }
  return out;
}

// ─────────────────────────────────────────────────────────────
// Statistics
// ─────────────────────────────────────────────────────────────

const ACTION_STAT: Record<ActionKind, keyof Pick<ChangeStatistics, 'create' | 'update' | 'delete' | 'replace' | 'noOp'>> = {
  create: 'create',
  update: 'update',
  delete: 'delete',
  replace: 'replace',
  'no-op': 'noOp',
};

export function calculateStatistics(analyses: readonly ResourceAnalysis[]): ChangeStatistics {
  const stats: ChangeStatistics = {
    create: 0,
    update: 0,
    delete: 0,
    replace: 0,
    noOp: 0,
    total: analyses.length,
    highRiskCount: 0,
    dangerousCount: 0,
  };

  for (const analysis of analyses) {
    stats[ACTION_STAT[analysis.action]]++;
    if (compareRisk(analysis.riskLevel, 'high') >= 0) stats.highRiskCount++;
    if (analysis.dangerous) stats.dangerousCount++;
  }

  return stats;
}
