import { describe, it, expect, vi } from 'vitest';
import { PlanAnalyzer, analyzePlan, calculateStatistics, formatReplacePath } from '../../../src/core/analyzer.js';
import { SensitivityIndex, buildSensitivityIndex } from '../../../src/core/sensitivity-index.js';
import { CancelledError } from '../../../src/core/errors.js';
import type { ResourceChangeInput, SensitivityRule } from '../../../src/types.js';

function makeChange(overrides: Partial<ResourceChangeInput> = {}): ResourceChangeInput {
  return {
    address: 'aws_instance.web',
    type: 'aws_instance',
    modulePath: '',
    action: 'update',
    before: { instance_type: 't3.micro' },
    after: { instance_type: 't3.large' },
    dependsOn: [],
    ...overrides,
  };
}

function indexOf(rules: SensitivityRule[]): SensitivityIndex {
  return buildSensitivityIndex(rules).index;
}

/** An object whose only property throws when read */
function explodingValue(): Record<string, unknown> {
  const value: Record<string, unknown> = {};
  Object.defineProperty(value, 'x', {
    enumerable: true,
    get() {
      throw new Error('boom');
    },
  });
  return value;
}

describe('core/analyzer', () => {
  describe('risk scenarios', () => {
    it('should rate a sensitive resource replacement as high', async () => {
      const index = indexOf([{ kind: 'resource', resourceType: 'aws_db_instance' }]);
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({
              address: 'aws_db_instance.main',
              type: 'aws_db_instance',
              action: 'replace',
              before: { engine: 'postgres', instance_class: 'db.t3.micro' },
              after: { engine: 'postgres', instance_class: 'db.t3.large' },
              replacePaths: [['instance_class']],
            }),
          ],
        },
        index
      );

      const [analysis] = report.analyses;
      expect(analysis.riskLevel).toBe('high');
      expect(analysis.dangerous).toBe(true);
      expect(analysis.reasons).toEqual(['sensitive resource replacement']);
      expect(analysis.replacementHints).toEqual(['instance_class']);
      expect(analysis.propertyChanges.changes[0].triggersReplacement).toBe(true);
      expect(analysis.display.detail).toEqual({
        summary: '1 risk reason',
        detail: '- sensitive resource replacement\nforces replacement: instance_class',
        expandByDefault: true,
      });
    });

    it('should redact a sensitive property update and rate it medium', async () => {
      const index = indexOf([{ kind: 'property', resourceType: 'aws_instance', property: 'user_data' }]);
      const report = await analyzePlan(
        { resourceChanges: [makeChange({ before: { user_data: 'A' }, after: { user_data: 'B' } })] },
        index
      );

      const [analysis] = report.analyses;
      expect(analysis.propertyChanges.changes).toHaveLength(1);
      expect(analysis.propertyChanges.changes[0].path).toEqual(['user_data']);
      expect(analysis.propertyChanges.changes[0].sensitive).toBe(true);
      expect(analysis.riskLevel).toBe('medium');
      expect(analysis.reasons).toEqual(['sensitive property change']);
      expect(analysis.display.detail).toEqual({
        summary: '1 property changed (1 sensitive)',
        detail: '~ user_data: (sensitive) → (sensitive)',
        expandByDefault: true,
      });
    });

    it('should rate a plain update low and keep it collapsed', async () => {
      const report = await analyzePlan({ resourceChanges: [makeChange()] }, SensitivityIndex.empty());
      const [analysis] = report.analyses;
      expect(analysis.riskLevel).toBe('low');
      expect(analysis.dangerous).toBe(false);
      expect(analysis.provider).toBe('aws');
      expect(analysis.display.detail).toEqual({
        summary: '1 property changed',
        detail: '~ instance_type: "t3.micro" → "t3.large"',
        expandByDefault: false,
      });
    });
  });

  describe('redaction', () => {
    it('should redact a create whose values hold a sensitive property', async () => {
      const index = indexOf([{ kind: 'property', resourceType: 'aws_instance', property: 'user_data' }]);
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({ action: 'create', before: null, after: { ami: 'ami-1', user_data: 'test-secret' } }),
          ],
        },
        index
      );

      const [analysis] = report.analyses;
      expect(analysis.riskLevel).toBe('low');
      expect(analysis.display.detail.detail).toBe('+ (root) = (sensitive)');
      expect(analysis.display.detail.expandByDefault).toBe(true);
    });

    it('should honor sensitivity declared by the plan itself', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({
              before: { password: 'old-placeholder', port: 5432 },
              after: { password: 'new-placeholder', port: 5432 },
              afterSensitive: { password: true },
            }),
          ],
        },
        SensitivityIndex.empty()
      );

      const [analysis] = report.analyses;
      expect(analysis.propertyChanges.changes[0].sensitive).toBe(true);
      expect(analysis.riskLevel).toBe('low');
      expect(analysis.display.detail.detail).toBe('~ password: (sensitive) → (sensitive)');
    });
  });

  describe('danger properties', () => {
    const index = indexOf([
      { kind: 'property', resourceType: 'aws_instance', property: 'user_data' },
      { kind: 'property', resourceType: 'aws_instance', property: 'metadata_options' },
    ]);

    it('should list the sensitive properties touched, sorted', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({
              before: { user_data: 'A', metadata_options: { x: 1 }, ami: 'ami-1' },
              after: { user_data: 'B', metadata_options: { x: 2 }, ami: 'ami-1' },
            }),
          ],
        },
        index
      );

      const [analysis] = report.analyses;
      expect(analysis.dangerProperties).toEqual(['metadata_options', 'user_data']);
      expect(analysis.riskLevel).toBe('medium');
    });

    it('should leave the list empty when nothing sensitive changes', async () => {
      const report = await analyzePlan({ resourceChanges: [makeChange()] }, index);
      expect(report.analyses[0].dangerProperties).toEqual([]);
    });

    it('should name the sensitive properties in a replacement detail', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({ action: 'replace', before: { user_data: 'A' }, after: { user_data: 'B' } }),
          ],
        },
        index
      );

      const [analysis] = report.analyses;
      expect(analysis.reasons).toEqual(['resource replacement', 'sensitive property change']);
      expect(analysis.display.detail).toEqual({
        summary: '2 risk reasons',
        detail: '- resource replacement\n- sensitive property change\nsensitive properties: user_data',
        expandByDefault: true,
      });
    });
  });

  describe('outputs', () => {
    it('should carry output changes with sensitive values dropped', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [],
          outputChanges: [
            {
              name: 'db_password',
              action: 'update',
              before: 'old-placeholder',
              after: 'new-placeholder',
              afterSensitive: true,
            },
            { name: 'endpoint', action: 'create', after: 'db.internal' },
          ],
        },
        SensitivityIndex.empty()
      );

      expect(report.outputs).toEqual([
        { name: 'db_password', action: 'update', sensitive: true, before: null, after: null },
        { name: 'endpoint', action: 'create', sensitive: false, before: null, after: 'db.internal' },
      ]);
      expect(Object.isFrozen(report.outputs)).toBe(true);
    });

    it('should report no outputs when the plan has none', async () => {
      const report = await analyzePlan({ resourceChanges: [makeChange()] }, SensitivityIndex.empty());
      expect(report.outputs).toEqual([]);
    });
  });

  describe('error isolation', () => {
    it('should keep analyzing siblings and escalate a resource with incomparable values', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({ address: 'aws_instance.a' }),
            makeChange({ address: 'aws_instance.b', before: { config: { a: 1 } }, after: { config: 'flat' } }),
            makeChange({ address: 'aws_instance.c' }),
          ],
        },
        SensitivityIndex.empty()
      );

      expect(report.analyses.map((a) => a.address)).toEqual(['aws_instance.a', 'aws_instance.b', 'aws_instance.c']);
      expect(report.errors).toHaveLength(1);
      expect(report.errors[0].address).toBe('aws_instance.b');
      expect(report.errors[0].stage).toBe('diff');
      expect(report.errors[0].message).toBe('incomparable values at config: map vs scalar');
      expect(report.analyses[1].riskLevel).toBe('high');
      expect(report.analyses[1].reasons).toEqual(['incomplete analysis (diff)']);
      expect(report.analyses[0].riskLevel).toBe('low');
      expect(report.analyses[2].riskLevel).toBe('low');
    });

    it('should catch a diff that throws', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({ address: 'aws_instance.bad', before: explodingValue(), after: { x: 1 } }),
            makeChange({ address: 'aws_instance.good' }),
          ],
        },
        SensitivityIndex.empty()
      );

      expect(report.analyses).toHaveLength(2);
      expect(report.errors.map((e) => [e.address, e.stage, e.message])).toEqual([['aws_instance.bad', 'diff', 'boom']]);
      expect(report.analyses[0].riskLevel).toBe('high');
      expect(report.analyses[0].propertyChanges.count).toBe(0);
    });

    it('should record a malformed dependency as a dependency-stage error', async () => {
      const report = await analyzePlan(
        { resourceChanges: [makeChange({ action: 'create', before: null, dependsOn: [''] })] },
        SensitivityIndex.empty()
      );

      expect(report.errors.map((e) => e.stage)).toEqual(['dependency']);
      expect(report.analyses[0].riskLevel).toBe('high');
      expect(report.analyses[0].reasons).toEqual(['incomplete analysis (dependency)']);
      expect(report.analyses[0].dependencies).toEqual({ dependsOn: [], usedBy: [], partial: false });
    });
  });

  describe('dependencies', () => {
    it('should combine declared dependencies with the forward map', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({ address: 'aws_vpc.main', type: 'aws_vpc' }),
            makeChange({ address: 'aws_instance.web' }),
          ],
          dependencies: { 'aws_instance.web': ['aws_vpc.main'] },
        },
        SensitivityIndex.empty()
      );

      expect(report.analyses[0].dependencies.usedBy).toEqual(['aws_instance.web']);
      expect(report.analyses[1].dependencies.dependsOn).toEqual(['aws_vpc.main']);
      expect(report.analyses[0].display.dependencies.summary).toBe('depends on 0, used by 1');
    });
  });

  describe('ordering and grouping', () => {
    const addresses = Array.from({ length: 12 }, (_, i) =>
      i % 3 === 0 ? `google_compute_instance.vm${i}` : `aws_instance.vm${i}`
    );
    const changes = addresses.map((address) =>
      makeChange({ address, type: address.split('.')[0] })
    );

    it('should keep plan order under concurrency', async () => {
      const analyzer = new PlanAnalyzer({ concurrency: 4 });
      const report = await analyzer.analyze({ resourceChanges: changes }, SensitivityIndex.empty());
      expect(report.analyses.map((a) => a.address)).toEqual(addresses);
    });

    it('should group by provider once the threshold is reached', async () => {
      const report = await analyzePlan({ resourceChanges: changes }, SensitivityIndex.empty());
      expect(report.grouping.applied).toBe(true);
      expect(report.grouping.groups.get('google')).toEqual([0, 3, 6, 9]);
      expect(report.grouping.groups.get('aws')).toEqual([1, 2, 4, 5, 7, 8, 10, 11]);
    });

    it('should not group when grouping is disabled', async () => {
      const report = await analyzePlan({ resourceChanges: changes }, SensitivityIndex.empty(), {
        grouping: { enabled: false, threshold: 10 },
      });
      expect(report.grouping.applied).toBe(false);
    });

    it('should return a frozen report', async () => {
      const report = await analyzePlan({ resourceChanges: changes }, SensitivityIndex.empty());
      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.analyses)).toBe(true);
    });

    it('should report an empty plan', async () => {
      const report = await analyzePlan({ resourceChanges: [] }, SensitivityIndex.empty());
      expect(report.analyses).toEqual([]);
      expect(report.statistics.total).toBe(0);
      expect(report.grouping.applied).toBe(false);
    });
  });

  describe('concurrency', () => {
    const plan = {
      resourceChanges: [makeChange({ address: 'aws_instance.old', action: 'delete', after: null })],
    };

    it.each([Number.NaN, 0, -2, Number.POSITIVE_INFINITY])(
      'should fall back to the default pool size for %s',
      async (concurrency) => {
        const report = await new PlanAnalyzer({ concurrency }).analyze(plan, SensitivityIndex.empty());
        expect(report.analyses).toHaveLength(1);
        expect(report.analyses[0].riskLevel).toBe('high');
        expect(report.statistics.delete).toBe(1);
      }
    );
  });

  describe('progress', () => {
    it('should report start and each completed resource', async () => {
      const onStart = vi.fn();
      const onResourceComplete = vi.fn();
      const analyzer = new PlanAnalyzer({ concurrency: 1 }, { onStart, onResourceComplete });

      await analyzer.analyze(
        { resourceChanges: [makeChange({ address: 'aws_instance.a' }), makeChange({ address: 'aws_instance.b' })] },
        SensitivityIndex.empty()
      );

      expect(onStart).toHaveBeenCalledWith(2);
      expect(onResourceComplete).toHaveBeenCalledTimes(2);
    });
  });

  describe('cancellation', () => {
    const plan = {
      resourceChanges: [
        makeChange({ address: 'aws_instance.a' }),
        makeChange({ address: 'aws_instance.b' }),
        makeChange({ address: 'aws_instance.c' }),
      ],
    };

    it('should reject with an empty partial report when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await new PlanAnalyzer()
        .analyze(plan, SensitivityIndex.empty(), { signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CancelledError);
      if (!(error instanceof CancelledError)) return;
      expect(error.partialReport.analyses).toEqual([]);
    });

    it('should stop between resources and keep completed analyses', async () => {
      const controller = new AbortController();
      const analyzer = new PlanAnalyzer(
        { concurrency: 1 },
        { onResourceComplete: () => controller.abort() }
      );

      const error = await analyzer
        .analyze(plan, SensitivityIndex.empty(), { signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CancelledError);
      if (!(error instanceof CancelledError)) return;
      expect(error.partialReport.analyses.map((a) => a.address)).toEqual(['aws_instance.a']);
      expect(error.partialReport.statistics.total).toBe(1);
    });

    it('should resolve normally when aborted after the last resource', async () => {
      const controller = new AbortController();
      let completed = 0;
      const analyzer = new PlanAnalyzer(
        { concurrency: 1 },
        {
          onResourceComplete: () => {
            completed++;
            if (completed === plan.resourceChanges.length) controller.abort();
          },
        }
      );

      const report = await analyzer.analyze(plan, SensitivityIndex.empty(), { signal: controller.signal });
      expect(report.analyses).toHaveLength(3);
    });
  });

  describe('calculateStatistics', () => {
    it('should count actions and risk', async () => {
      const report = await analyzePlan(
        {
          resourceChanges: [
            makeChange({ address: 'aws_instance.c', action: 'create', before: null }),
            makeChange({ address: 'aws_instance.u' }),
            makeChange({ address: 'aws_instance.d', action: 'delete', after: null }),
            makeChange({ address: 'aws_instance.r', action: 'replace' }),
            makeChange({ address: 'aws_instance.n', action: 'no-op', after: { instance_type: 't3.micro' } }),
          ],
        },
        SensitivityIndex.empty()
      );

      expect(report.statistics).toEqual({
        create: 1,
        update: 1,
        delete: 1,
        replace: 1,
        noOp: 1,
        total: 5,
        highRiskCount: 1,
        dangerousCount: 2,
      });
      expect(calculateStatistics(report.analyses)).toEqual(report.statistics);
    });
  });

  describe('formatReplacePath', () => {
    it('should render list indices in brackets', () => {
      expect(formatReplacePath(['network_interface', 0, 'subnet_id'])).toBe('network_interface[0].subnet_id');
      expect(formatReplacePath(['ami'])).toBe('ami');
    });
  });
});
