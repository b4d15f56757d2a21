/**
 * Output changes
 *
 * Root-module outputs carry no risk of their own; they are listed with their
 * action, and their values are dropped when the plan marks them sensitive.
 */

import type { OutputChange, OutputChangeInput } from '../types.js';
import { isMap } from './property-diff.js';

export function analyzeOutputChanges(outputs: readonly OutputChangeInput[]): OutputChange[] {
  return outputs.map((output) => {
    const sensitive = hasTrueLeaf(output.beforeSensitive) || hasTrueLeaf(output.afterSensitive);
    return {
      name: output.name,
      action: output.action,
      sensitive,
      before: sensitive ? null : output.before ?? null,
      after: sensitive ? null : output.after ?? null,
    };
  });
}

/** True if a plan sensitivity tree is, or holds, a `true` leaf */
export function hasTrueLeaf(node: unknown): boolean {
  if (node === true) return true;
  if (Array.isArray(node)) return node.some(hasTrueLeaf);
  if (isMap(node)) return Object.values(node).some(hasTrueLeaf);
  return false;
}
