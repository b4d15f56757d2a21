// planwarden - risk analysis for infrastructure plan changes

export * from './types.js';
export * from './core/errors.js';
export { SensitivityIndex, buildSensitivityIndex, RESOURCE_TYPE_PATTERN } from './core/sensitivity-index.js';
export type { SensitivityIndexBuild } from './core/sensitivity-index.js';
export { diffValues, deepEqual, estimateSize, DEFAULT_DIFF_LIMITS } from './core/property-diff.js';
export { assessRisk } from './core/risk-assessor.js';
export type { RiskAssessment } from './core/risk-assessor.js';
export { buildReverseIndex, extractDependencies, DEFAULT_MAX_DEPENDENCIES } from './core/dependency-extractor.js';
export type { ForwardEdges } from './core/dependency-extractor.js';
export {
  groupByProvider,
  underscorePrefixResolver,
  DEFAULT_GROUP_THRESHOLD,
  UNKNOWN_PROVIDER,
} from './core/grouping.js';
export type { ProviderResolver } from './core/grouping.js';
export {
  shouldExpand,
  propertyChangesValue,
  reasonsValue,
  dependenciesValue,
  formatPropertyChange,
  REDACTED_VALUE,
  TRUNCATION_MARKER,
} from './core/disclosure.js';
export type { DisclosureOptions } from './core/disclosure.js';
export { PlanAnalyzer, analyzePlan, calculateStatistics, DEFAULT_ANALYZER_CONFIG } from './core/analyzer.js';
export type { AnalyzerConfig, AnalysisProgress, AnalyzeOptions, PlanToAnalyze } from './core/analyzer.js';
export { analyzeOutputChanges } from './core/output-changes.js';
export { loadConfig, rulesFromConfig, analyzerConfigFromConfig } from './core/config.js';
export { safeParseJson, formatZodError, parsePlanInput } from './core/validation.js';
export { renderReport, formatAnalysis, formatOutputChange } from './output/terminal.js';
export { outputJson, reportToJson } from './output/json.js';
