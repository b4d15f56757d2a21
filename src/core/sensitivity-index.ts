/**
 * Sensitivity Index
 *
 * Compiles user-supplied sensitivity rules into set/map lookups. The index is
 * frozen after construction and can be shared between analyses of plans that
 * use the same config.
 */

import type { SensitivityRule } from '../types.js';
import { ValidationError } from './errors.js';

/** `provider_resource`: a provider prefix, an underscore, then the resource name */
export const RESOURCE_TYPE_PATTERN = /^[A-Za-z0-9-]+_[A-Za-z0-9_-]+$/;

export interface SensitivityIndexBuild {
  index: SensitivityIndex;
  errors: ValidationError[];
  warnings: string[];
}

export class SensitivityIndex {
  private readonly resources: ReadonlySet<string>;
  private readonly properties: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(resources: Set<string>, properties: Map<string, Set<string>>) {
    this.resources = resources;
    this.properties = properties;
    Object.freeze(this);
  }

  static empty(): SensitivityIndex {
    return new SensitivityIndex(new Set(), new Map());
  }

  /**
   * Validate and compile rules. Invalid rules are reported and skipped,
   * duplicates are reported as warnings and the first registration wins.
   */
  static build(rules: readonly SensitivityRule[]): SensitivityIndexBuild {
    const resources = new Set<string>();
    const properties = new Map<string, Set<string>>();
    const errors: ValidationError[] = [];
    const warnings: string[] = [];

    rules.forEach((rule, i) => {
      const typeProblem = checkResourceType(rule.resourceType);
      if (typeProblem) {
        errors.push(new ValidationError(i, 'resourceType', `rule ${i}: ${typeProblem}`));
        return;
      }

      if (rule.kind === 'resource') {
        if (resources.has(rule.resourceType)) {
          warnings.push(`rule ${i}: duplicate sensitive resource "${rule.resourceType}" ignored`);
          return;
        }
        resources.add(rule.resourceType);
        return;
      }

      if (rule.property.trim() === '') {
        errors.push(new ValidationError(i, 'property', `rule ${i}: property name is empty`));
        return;
      }

      let props = properties.get(rule.resourceType);
      if (!props) {
        props = new Set();
        properties.set(rule.resourceType, props);
      }
      if (props.has(rule.property)) {
        warnings.push(
          `rule ${i}: duplicate sensitive property "${rule.resourceType}.${rule.property}" ignored`
        );
        return;
      }
      props.add(rule.property);
    });

    return { index: new SensitivityIndex(resources, properties), errors, warnings };
  }

  isSensitiveResource(resourceType: string): boolean {
    return this.resources.has(resourceType);
  }

  isSensitiveProperty(resourceType: string, property: string): boolean {
    return this.properties.get(resourceType)?.has(property) ?? false;
  }

  get resourceRuleCount(): number {
    return this.resources.size;
  }

  get propertyRuleCount(): number {
    let count = 0;
    for (const props of this.properties.values()) count += props.size;
    return count;
  }
}

function checkResourceType(resourceType: string): string | undefined {
  if (resourceType.trim() === '') {
    return 'resource type is empty';
  }
  if (!RESOURCE_TYPE_PATTERN.test(resourceType)) {
    return `resource type "${resourceType}" is not of the form provider_resource`;
  }
  return undefined;
}

export function buildSensitivityIndex(rules: readonly SensitivityRule[]): SensitivityIndexBuild {
  return SensitivityIndex.build(rules);
}
