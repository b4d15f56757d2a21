/**
 * Terminal Report Formatter
 *
 * Renders an analysis report for a terminal:
 * - One block per resource, in plan order (or per provider when grouped)
 * - Summaries always shown, details only when expanded
 * - Risk level colored the same way as the summary card
 */

import chalk from 'chalk';
import type { ActionKind, AnalysisReport, CollapsibleValue, OutputChange, ResourceAnalysis } from '../types.js';
import { REDACTED_VALUE, formatValue } from '../core/disclosure.js';
import { riskColor } from '../cli/components/card.js';

export interface RenderOptions {
  /** Show every detail, overriding each value's own expandByDefault */
  expandAll?: boolean;
}

const ACTION_SYMBOLS: Record<ActionKind, string> = {
  create: '+',
  update: '~',
  delete: '-',
  replace: '-/+',
  'no-op': '=',
};

function actionSymbol(action: ActionKind): string {
  const colors: Record<ActionKind, (s: string) => string> = {
    create: chalk.green,
    update: chalk.yellow,
    delete: chalk.red,
    replace: chalk.magenta,
    'no-op': chalk.dim,
  };
  return colors[action](ACTION_SYMBOLS[action]);
}

const INDENT = '    ';

function collapsible(value: CollapsibleValue, expandAll: boolean): string[] {
  const lines = [INDENT + value.summary];
  if ((expandAll || value.expandByDefault) && value.detail !== '') {
    for (const detailLine of value.detail.split('\n')) {
      lines.push(INDENT + '  ' + chalk.dim(detailLine));
    }
  }
  return lines;
}

export function formatAnalysis(analysis: ResourceAnalysis, options: RenderOptions = {}): string {
  const expandAll = options.expandAll ?? false;
  const level = riskColor(analysis.riskLevel)(`[${analysis.riskLevel.toUpperCase()}]`);
  const lines = [`${actionSymbol(analysis.action)} ${chalk.bold(analysis.address)}  ${level}`];

  if (analysis.reasons.length > 0 && analysis.action !== 'replace') {
    lines.push(INDENT + chalk.dim('reasons: ') + analysis.reasons.join(', '));
  }
  if (analysis.dangerProperties.length > 0 && analysis.action !== 'replace') {
    lines.push(INDENT + chalk.dim('sensitive properties: ') + analysis.dangerProperties.join(', '));
  }
  lines.push(...collapsible(analysis.display.detail, expandAll));
  lines.push(...collapsible(analysis.display.dependencies, expandAll));

  return lines.join('\n');
}

export function formatOutputChange(output: OutputChange): string {
  const symbol = actionSymbol(output.action);
  if (output.sensitive) {
    return `${symbol} ${output.name} = ${REDACTED_VALUE}`;
  }
  switch (output.action) {
    case 'create':
      return `${symbol} ${output.name} = ${formatValue(output.after)}`;
    case 'delete':
      return `${symbol} ${output.name} = ${formatValue(output.before)}`;
    case 'no-op':
      return `${symbol} ${output.name} = ${formatValue(output.after)}`;
    default:
      return `${symbol} ${output.name}: ${formatValue(output.before)} → ${formatValue(output.after)}`;
  }
}

export function renderReport(report: AnalysisReport, options: RenderOptions = {}): string {
  const blocks: string[] = [];

  if (report.grouping.applied) {
    for (const [provider, indices] of report.grouping.groups) {
      blocks.push(chalk.bold.underline(`${provider} (${indices.length})`));
      for (const i of indices) {
        blocks.push(formatAnalysis(report.analyses[i], options));
      }
    }
  } else {
    for (const analysis of report.analyses) {
      blocks.push(formatAnalysis(analysis, options));
    }
  }

  if (report.outputs.length > 0) {
    blocks.push(chalk.bold(`Outputs (${report.outputs.length})`));
    blocks.push(report.outputs.map((output) => INDENT + formatOutputChange(output)).join('\n'));
  }

  if (report.errors.length > 0) {
    blocks.push(chalk.bold.red(`Errors (${report.errors.length})`));
    for (const error of report.errors) {
      blocks.push(`${INDENT}${error.address} [${error.stage}]: ${error.message}`);
    }
  }

  return blocks.join('\n\n');
}
