/**
 * Risk Assessor - Deterministic Risk Rules
 *
 * Pure function of (action, sensitive resource?, sensitive properties touched).
 * The first matching rule decides the level; every matching rule adds its
 * reason, so a sensitive replacement that also rewrites a sensitive property
 * reports both.
 */

import type { ActionKind, RiskLevel } from '../types.js';

export interface RiskAssessment {
  level: RiskLevel;
  reasons: string[];
  dangerous: boolean;
}

interface RiskRule {
  level: RiskLevel;
  reason: string;
  /** Whether the rule may set the level, not only contribute its reason */
  setsLevel: (action: ActionKind) => boolean;
  matches: (action: ActionKind, sensitiveResource: boolean, touched: number) => boolean;
}

const always = (): boolean => true;

const RULES: RiskRule[] = [
  {
    level: 'critical',
    reason: 'sensitive resource deletion',
    setsLevel: always,
    matches: (action, sensitive) => action === 'delete' && sensitive,
  },
  {
    level: 'high',
    reason: 'resource deletion',
    setsLevel: always,
    matches: (action, sensitive) => action === 'delete' && !sensitive,
  },
  {
    level: 'high',
    reason: 'sensitive resource replacement',
    setsLevel: always,
    matches: (action, sensitive) => action === 'replace' && sensitive,
  },
  {
    level: 'medium',
    reason: 'resource replacement',
    setsLevel: always,
    matches: (action, sensitive) => action === 'replace' && !sensitive,
  },
  {
    level: 'medium',
    reason: 'sensitive property change',
    setsLevel: (action) => action === 'update',
    matches: (action, _sensitive, touched) =>
      touched > 0 && (action === 'update' || action === 'replace' || action === 'delete'),
  },
];

export function assessRisk(
  action: ActionKind,
  isSensitiveResource: boolean,
  sensitivePropertiesTouched: number
): RiskAssessment {
  let level: RiskLevel | undefined;
  const reasons: string[] = [];

  for (const rule of RULES) {
    if (!rule.matches(action, isSensitiveResource, sensitivePropertiesTouched)) continue;
    if (level === undefined && rule.setsLevel(action)) {
      level = rule.level;
    }
    if (!reasons.includes(rule.reason)) {
      reasons.push(rule.reason);
    }
  }

  const finalLevel = level ?? 'low';
  return { level: finalLevel, reasons, dangerous: finalLevel !== 'low' };
}
