/**
 * JSON report output
 *
 * Maps become plain objects and sensitive property values are replaced, so
 * the JSON form is as safe to print as the terminal form.
 */

import type { AnalysisReport, OutputChange, PropertyChange, ResourceAnalysis } from '../types.js';
import { REDACTED_VALUE } from '../core/disclosure.js';

export interface JsonReport {
  analyses: ResourceAnalysis[];
  outputs: OutputChange[];
  statistics: AnalysisReport['statistics'];
  errors: Array<{ address: string; stage: string; message: string }>;
  grouping: { applied: boolean; groups: Record<string, number[]> };
}

function redactChange(change: PropertyChange): PropertyChange {
  if (!change.sensitive) return { ...change, path: [...change.path] };
  return {
    ...change,
    path: [...change.path],
    before: change.before === null ? null : REDACTED_VALUE,
    after: change.after === null ? null : REDACTED_VALUE,
  };
}

export function reportToJson(report: AnalysisReport): JsonReport {
  const groups: Record<string, number[]> = {};
  for (const [provider, indices] of report.grouping.groups) {
    groups[provider] = [...indices];
  }

  return {
    analyses: report.analyses.map((analysis) => ({
      ...analysis,
      propertyChanges: {
        ...analysis.propertyChanges,
        changes: analysis.propertyChanges.changes.map(redactChange),
      },
    })),
    outputs: report.outputs.map((output) => ({ ...output })),
    statistics: { ...report.statistics },
    // `cause` may hold arbitrary objects; the message is enough here
    errors: report.errors.map(({ address, stage, message }) => ({ address, stage, message })),
    grouping: { applied: report.grouping.applied, groups },
  };
}

export function outputJson(report: AnalysisReport): string {
  return JSON.stringify(reportToJson(report), null, 2);
}
