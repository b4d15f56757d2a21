import * as p from '@clack/prompts';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { basename, resolve } from 'path';
import { RiskLevel, compareRisk, type AnalysisReport, type PlanwardenConfig } from '../../types.js';
import { analyzerConfigFromConfig, loadConfig, rulesFromConfig } from '../../core/config.js';
import { buildSensitivityIndex } from '../../core/sensitivity-index.js';
import { PlanAnalyzer, type AnalyzerConfig } from '../../core/analyzer.js';
import { CancelledError, errorMessage } from '../../core/errors.js';
import { parsePlanInput } from '../../core/validation.js';
import { renderReportCard } from '../components/card.js';
import { renderReport } from '../../output/terminal.js';
import { outputJson } from '../../output/json.js';

interface AnalyzeOptions {
  config?: string;
  json: boolean;
  expandAll?: boolean;
  groupThreshold?: number;
  maxProperties?: number;
  maxDepth?: number;
  concurrency?: number;
  failOn?: RiskLevel;
}

export const EXIT_RISK_THRESHOLD = 2;

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseRiskLevel(value: string): RiskLevel {
  const result = RiskLevel.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Must be one of: ${RiskLevel.options.join(', ')}.`);
  }
  return result.data;
}

/**
 * Whether any resource is at or above the given level
 */
export function exceedsRisk(report: AnalysisReport, threshold: RiskLevel): boolean {
  return report.analyses.some((analysis) => compareRisk(analysis.riskLevel, threshold) >= 0);
}

function fail(isQuiet: boolean, message: string): never {
  if (isQuiet) {
    console.error(JSON.stringify({ error: message }));
  } else {
    p.log.error(message);
  }
  process.exit(1);
}

export async function analyzeCommand(planPath: string, options: AnalyzeOptions): Promise<void> {
  const cwd = process.cwd();
  const isQuiet = options.json;

  if (!isQuiet) {
    p.intro(chalk.red('planwarden') + chalk.dim(' - plan risk analysis'));
  }

  // ─────────────────────────────────────────────────────────────
  // Load plan and config
  // ─────────────────────────────────────────────────────────────
  const absolutePlanPath = resolve(cwd, planPath);
  if (!existsSync(absolutePlanPath)) {
    fail(isQuiet, `Plan file not found: ${planPath}`);
  }

  const parsed = parsePlanInput(readFileSync(absolutePlanPath, 'utf-8'));
  if (!parsed.success) {
    fail(isQuiet, `Invalid plan file: ${parsed.error}`);
  }
  const plan = parsed.data;

  let config: PlanwardenConfig;
  try {
    config = loadConfig(cwd, options.config);
  } catch (error) {
    fail(isQuiet, `Failed to load config: ${errorMessage(error)}`);
  }

  const { index, errors: ruleErrors, warnings } = buildSensitivityIndex(rulesFromConfig(config));
  if (!isQuiet) {
    for (const ruleError of ruleErrors) p.log.warn(`Skipped invalid rule: ${ruleError.message}`);
    for (const warning of warnings) p.log.warn(warning);
  }

  // CLI flags win over the config file
  const configured = analyzerConfigFromConfig(config);
  const analyzerConfig: Partial<AnalyzerConfig> = {
    ...configured,
    limits: {
      ...configured.limits,
      maxDepth: options.maxDepth ?? configured.limits.maxDepth,
      maxProperties: options.maxProperties ?? configured.limits.maxProperties,
    },
    grouping: {
      ...configured.grouping,
      threshold: options.groupThreshold ?? configured.grouping.threshold,
    },
    disclosure: {
      ...configured.disclosure,
      expandAll: options.expandAll || configured.disclosure.expandAll,
    },
  };
  if (options.concurrency !== undefined) {
    analyzerConfig.concurrency = options.concurrency;
  }

  // ─────────────────────────────────────────────────────────────
  // Analyze
  // ─────────────────────────────────────────────────────────────
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const spinner = isQuiet ? null : p.spinner();
  let done = 0;
  const analyzer = new PlanAnalyzer(analyzerConfig, {
    onStart: (total) => spinner?.start(`Analyzing ${total} resource changes...`),
    onResourceComplete: (analysis) => {
      done++;
      spinner?.message(`[${done}/${plan.resourceChanges.length}] ${analysis.address}`);
    },
  });

  const startTime = Date.now();
  let report: AnalysisReport;
  let cancelled = false;
  try {
    report = await analyzer.analyze(plan, index, { signal: controller.signal });
  } catch (error) {
    if (!(error instanceof CancelledError)) throw error;
    report = error.partialReport;
    cancelled = true;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
  const duration = Date.now() - startTime;

  // ─────────────────────────────────────────────────────────────
  // Output
  // ─────────────────────────────────────────────────────────────
  if (isQuiet) {
    console.log(outputJson(report));
  } else {
    spinner?.stop(
      cancelled
        ? `Cancelled after ${report.analyses.length} of ${plan.resourceChanges.length} resources`
        : `Analyzed ${report.analyses.length} resource changes`
    );
    console.log();
    console.log(renderReport(report));
    console.log();
    console.log(renderReportCard({ planName: basename(absolutePlanPath), duration, report }));
    console.log();
  }

  if (cancelled) {
    if (!isQuiet) p.outro(chalk.yellow('Analysis cancelled; report is partial.'));
    process.exit(130);
  }

  if (options.failOn && exceedsRisk(report, options.failOn)) {
    if (!isQuiet) p.outro(chalk.red(`Found changes at or above ${options.failOn} risk.`));
    process.exit(EXIT_RISK_THRESHOLD);
  }

  if (!isQuiet) {
    p.outro(
      report.statistics.dangerousCount > 0
        ? chalk.yellow(`${report.statistics.dangerousCount} dangerous change(s) need review.`)
        : chalk.green('No dangerous changes found.')
    );
  }
}
