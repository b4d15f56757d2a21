/**
 * Property Diff Engine
 *
 * Recursive before/after comparison producing an ordered, size-bounded list of
 * leaf changes. Maps are walked key by key in sorted order; lists are compared
 * as whole values so list-valued attributes produce one stable entry.
 *
 * The engine knows nothing about resource types. Sensitivity tagging happens
 * in the analyzer, and errors carry paths and shape names only, never values.
 */

import type { DiffLimits, PropertyChange, PropertyChangeAction, PropertyChangeSet } from '../types.js';
import { DiffError } from './errors.js';

export const DEFAULT_DIFF_LIMITS: DiffLimits = {
  maxDepth: 5,
  maxProperties: 100,
  maxTotalBytes: 10 * 1024 * 1024,
};

export interface DiffResult {
  changeSet: PropertyChangeSet;
  errors: DiffError[];
}

type ValueKind = 'absent' | 'map' | 'list' | 'scalar';

export function diffValues(
  before: unknown,
  after: unknown,
  limits: Partial<DiffLimits> = {}
): DiffResult {
  const walker = new DiffWalker({ ...DEFAULT_DIFF_LIMITS, ...limits });
  walker.walk(before, after, [], 0);
  return walker.result();
}

class DiffWalker {
  private readonly changes: PropertyChange[] = [];
  private readonly errors: DiffError[] = [];
  private totalSize = 0;
  private truncated = false;
  private stopped = false;

  constructor(private readonly limits: DiffLimits) {}

  walk(before: unknown, after: unknown, path: string[], depth: number): void {
    if (this.stopped) return;

    const beforeKind = kindOf(before);
    const afterKind = kindOf(after);

    if (beforeKind === 'absent' && afterKind === 'absent') return;

    if (beforeKind === 'absent' || afterKind === 'absent') {
      this.emit(path, before, after);
      return;
    }

    if (beforeKind !== afterKind) {
      this.errors.push(new DiffError(path, beforeKind, afterKind));
      this.emit(path, before, after);
      return;
    }

    if (beforeKind === 'list') {
      if (!deepEqual(before, after)) this.emit(path, before, after);
      return;
    }

    if (beforeKind === 'scalar') {
      if (before !== after) this.emit(path, before, after);
      return;
    }

    if (!isMap(before) || !isMap(after)) return;

    if (depth > this.limits.maxDepth) {
      if (!deepEqual(before, after)) {
        this.truncated = true;
        this.emit(path, before, after);
      }
      return;
    }

    const keys = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();
    for (const key of keys) {
      if (this.stopped) return;
      const childPath = [...path, key];
      const inBefore = Object.prototype.hasOwnProperty.call(before, key);
      const inAfter = Object.prototype.hasOwnProperty.call(after, key);

      if (inBefore && inAfter) {
        this.walk(before[key], after[key], childPath, depth + 1);
      } else if (kindOf(before[key]) !== 'absent' || kindOf(after[key]) !== 'absent') {
        // One-sided key: recorded whole, its subtree is not walked
        this.emit(childPath, before[key], after[key]);
      }
    }
  }

  result(): DiffResult {
    return {
      changeSet: {
        changes: this.changes,
        count: this.changes.length,
        totalSize: this.totalSize,
        truncated: this.truncated,
      },
      errors: this.errors,
    };
  }

  private emit(path: string[], before: unknown, after: unknown): void {
    if (this.changes.length >= this.limits.maxProperties) {
      this.stop();
      return;
    }

    const size = estimateSize(before) + estimateSize(after);
    if (this.totalSize + size > this.limits.maxTotalBytes) {
      this.stop();
      return;
    }

    this.totalSize += size;
    this.changes.push({
      path,
      before: normalizeAbsent(before),
      after: normalizeAbsent(after),
      action: actionFor(before, after),
      sensitive: false,
      triggersReplacement: false,
      size,
    });
  }

  private stop(): void {
    this.stopped = true;
    this.truncated = true;
  }
}

// ─────────────────────────────────────────────────────────────
// Value helpers
// ─────────────────────────────────────────────────────────────

export function isMap(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function kindOf(value: unknown): ValueKind {
  if (value === null || value === undefined) return 'absent';
  if (Array.isArray(value)) return 'list';
  if (isMap(value)) return 'map';
  return 'scalar';
}

function normalizeAbsent(value: unknown): unknown {
  return value === undefined ? null : value;
}

function actionFor(before: unknown, after: unknown): PropertyChangeAction {
  if (kindOf(before) === 'absent') return 'add';
  if (kindOf(after) === 'absent') return 'remove';
  return 'update';
}

/**
 * Structural equality for JSON-shaped values. `undefined` and `null` are the
 * same absent value.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  const aKind = kindOf(a);
  const bKind = kindOf(b);
  if (aKind !== bKind) return false;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isMap(a) && isMap(b)) {
    const aKeys = Object.keys(a).filter((k) => kindOf(a[k]) !== 'absent');
    const bKeys = Object.keys(b).filter((k) => kindOf(b[k]) !== 'absent');
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((k) => deepEqual(a[k], b[k]));
  }

  return aKind === 'absent' || a === b;
}

/**
 * Cheap byte estimate: string length, 8 per number, 1 per boolean, keys plus
 * values for maps. No serialization.
 */
export function estimateSize(value: unknown): number {
  if (value === null || value === undefined) return 0;
  switch (typeof value) {
    case 'string':
      return value.length;
    case 'number':
    case 'bigint':
      return 8;
    case 'boolean':
      return 1;
    default:
      break;
  }
  if (Array.isArray(value)) {
    let size = 0;
    for (const item of value) size += estimateSize(item);
    return size;
  }
  if (isMap(value)) {
    let size = 0;
    for (const [key, item] of Object.entries(value)) size += key.length + estimateSize(item);
    return size;
  }
  return String(value).length;
}
