/**
 * Provider grouping
 *
 * Groups are lists of indices into the report's analyses, keyed by provider in
 * the order providers first appear in the plan.
 */

import type { GroupingResult, ResourceAnalysis } from '../types.js';

export const DEFAULT_GROUP_THRESHOLD = 10;
export const UNKNOWN_PROVIDER = 'unknown';

export interface ProviderResolver {
  resolve(resourceType: string): string;
}

/** `aws_s3_bucket` -> `aws`. Types without a non-empty prefix map to `unknown`. */
export const underscorePrefixResolver: ProviderResolver = {
  resolve(resourceType: string): string {
    const cut = resourceType.indexOf('_');
    if (cut <= 0) return UNKNOWN_PROVIDER;
    return resourceType.slice(0, cut);
  },
};

export function groupByProvider(
  analyses: readonly Pick<ResourceAnalysis, 'type'>[],
  threshold: number = DEFAULT_GROUP_THRESHOLD,
  resolver: ProviderResolver = underscorePrefixResolver
): GroupingResult {
  const groups = new Map<string, number[]>();

  if (analyses.length < threshold) {
    return { groups: new Map(), applied: false };
  }

  analyses.forEach((analysis, i) => {
    const provider = resolver.resolve(analysis.type);
    const members = groups.get(provider);
    if (members) {
      members.push(i);
    } else {
      groups.set(provider, [i]);
    }
  });

  // One provider only: grouping adds nothing over the flat list
  if (groups.size <= 1) {
    return { groups: new Map(), applied: false };
  }

  return { groups, applied: true };
}
