/**
 * Progressive disclosure
 *
 * Wraps per-resource details as (summary, detail, expandByDefault) triples so
 * any renderer can show the summary and fold the detail. Summaries always
 * carry the true counts; details are capped and have sensitive values
 * replaced before they leave the engine.
 */

import type {
  CollapsibleValue,
  DependencyInfo,
  PropertyChange,
  PropertyChangeSet,
  RiskLevel,
} from '../types.js';
import { compareRisk } from '../types.js';
import { formatPath } from './errors.js';

export const REDACTED_VALUE = '(sensitive)';
export const TRUNCATION_MARKER = '... [truncated]';
export const DEFAULT_MAX_DETAIL_LENGTH = 500;

export interface DisclosureOptions {
  expandAll: boolean;
  maxDetailLength: number;
}

export const DEFAULT_DISCLOSURE_OPTIONS: DisclosureOptions = {
  expandAll: false,
  maxDetailLength: DEFAULT_MAX_DETAIL_LENGTH,
};

export function shouldExpand(
  riskLevel: RiskLevel,
  changeSet: PropertyChangeSet,
  expandAll: boolean
): boolean {
  if (expandAll) return true;
  if (compareRisk(riskLevel, 'high') >= 0) return true;
  return changeSet.changes.some((change) => change.sensitive);
}

export function capDetail(detail: string, maxLength: number): string {
  if (detail.length <= maxLength) return detail;
  return detail.slice(0, maxLength) + TRUNCATION_MARKER;
}

// ─────────────────────────────────────────────────────────────
// Property changes
// ─────────────────────────────────────────────────────────────

export function propertyChangesValue(
  changeSet: PropertyChangeSet,
  expand: boolean,
  options: DisclosureOptions
): CollapsibleValue {
  const detail = changeSet.changes.map(formatPropertyChange).join('\n');
  return {
    summary: propertyChangesSummary(changeSet),
    detail: capDetail(detail, options.maxDetailLength),
    expandByDefault: expand,
  };
}

export function propertyChangesSummary(changeSet: PropertyChangeSet): string {
  if (changeSet.count === 0) {
    return 'no properties changed';
  }
  const noun = changeSet.count === 1 ? 'property' : 'properties';
  let summary = `${changeSet.count} ${noun} changed`;
  const sensitiveCount = changeSet.changes.filter((c) => c.sensitive).length;
  if (sensitiveCount > 0) {
    summary += ` (${sensitiveCount} sensitive)`;
  }
  if (changeSet.truncated) {
    summary += ' [truncated]';
  }
  return summary;
}

/**
 * One line per change in plan-diff style:
 *   + path = value, - path = value, ~ path: before → after
 */
export function formatPropertyChange(change: PropertyChange): string {
  const path = formatPath(change.path);
  const before = change.sensitive ? REDACTED_VALUE : formatValue(change.before);
  const after = change.sensitive ? REDACTED_VALUE : formatValue(change.after);
  const suffix = change.triggersReplacement ? ' # forces replacement' : '';

  switch (change.action) {
    case 'add':
      return `+ ${path} = ${after}${suffix}`;
    case 'remove':
      return `- ${path} = ${before}${suffix}`;
    default:
      return `~ ${path}: ${before} → ${after}${suffix}`;
  }
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '(none)';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value) ?? String(value);
}

// ─────────────────────────────────────────────────────────────
// Reasons & dependencies
// ─────────────────────────────────────────────────────────────

export function reasonsValue(
  reasons: readonly string[],
  replacementHints: readonly string[],
  expand: boolean,
  options: DisclosureOptions,
  dangerProperties: readonly string[] = []
): CollapsibleValue {
  const summary =
    reasons.length === 0
      ? 'no risk reasons'
      : `${reasons.length} risk ${reasons.length === 1 ? 'reason' : 'reasons'}`;
  const lines = [
    ...reasons.map((reason) => `- ${reason}`),
    ...replacementHints.map((hint) => `forces replacement: ${hint}`),
  ];
  if (dangerProperties.length > 0) {
    lines.push(`sensitive properties: ${dangerProperties.join(', ')}`);
  }
  return {
    summary,
    detail: capDetail(lines.join('\n'), options.maxDetailLength),
    expandByDefault: expand,
  };
}

export function dependenciesValue(
  info: DependencyInfo,
  expand: boolean,
  options: DisclosureOptions
): CollapsibleValue {
  let summary = `depends on ${info.dependsOn.length}, used by ${info.usedBy.length}`;
  if (info.partial) {
    summary += ' (partial)';
  }
  const lines = [
    ...info.dependsOn.map((address) => `depends on: ${address}`),
    ...info.usedBy.map((address) => `used by: ${address}`),
  ];
  return {
    summary,
    detail: capDetail(lines.join('\n'), options.maxDetailLength),
    expandByDefault: expand,
  };
}
