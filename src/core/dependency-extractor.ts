/**
 * Dependency Extractor
 *
 * Direct-neighbour lookups only: what a resource declares it depends on, and
 * which resources declare it. No transitive walk, so cycles cost nothing; the
 * result cap exists for resources with very high fan-in such as a shared VPC.
 */

import type { DependencyInfo, ResourceChangeInput, ReverseIndex } from '../types.js';
import { DependencyError } from './errors.js';

export const DEFAULT_MAX_DEPENDENCIES = 100;

export type ForwardEdges = Readonly<Record<string, readonly string[]>>;

/**
 * Build address -> dependents once per plan. Dependents appear in plan order,
 * each at most once.
 */
export function buildReverseIndex(
  changes: readonly ResourceChangeInput[],
  forwardEdges: ForwardEdges = {}
): ReverseIndex {
  const reverse = new Map<string, string[]>();
  const seen = new Map<string, Set<string>>();

  for (const change of changes) {
    for (const target of declaredDependencies(change, forwardEdges)) {
      if (typeof target !== 'string' || target === '' || target === change.address) continue;
      let dependents = reverse.get(target);
      let dependentSet = seen.get(target);
      if (!dependents || !dependentSet) {
        dependents = [];
        dependentSet = new Set();
        reverse.set(target, dependents);
        seen.set(target, dependentSet);
      }
      if (dependentSet.has(change.address)) continue;
      dependentSet.add(change.address);
      dependents.push(change.address);
    }
  }

  return reverse;
}

export function extractDependencies(
  change: ResourceChangeInput,
  forwardEdges: ForwardEdges,
  reverseIndex: ReverseIndex,
  maxResults: number = DEFAULT_MAX_DEPENDENCIES
): DependencyInfo {
  const dependsOn: string[] = [];
  const seen = new Set<string>();

  for (const target of declaredDependencies(change, forwardEdges)) {
    if (typeof target !== 'string' || target === '') {
      throw new DependencyError(change.address, `malformed dependency address declared by ${change.address}`);
    }
    if (target === change.address || seen.has(target)) continue;
    seen.add(target);
    dependsOn.push(target);
  }

  const usedBy = reverseIndex.get(change.address) ?? [];
  const partial = dependsOn.length > maxResults || usedBy.length > maxResults;

  return {
    dependsOn: dependsOn.slice(0, maxResults),
    usedBy: usedBy.slice(0, maxResults),
    partial,
  };
}

export function emptyDependencyInfo(): DependencyInfo {
  return { dependsOn: [], usedBy: [], partial: false };
}

function declaredDependencies(change: ResourceChangeInput, forwardEdges: ForwardEdges): unknown[] {
  const fromMap = Object.prototype.hasOwnProperty.call(forwardEdges, change.address)
    ? forwardEdges[change.address]
    : undefined;
  return [...change.dependsOn, ...(fromMap ?? [])];
}
