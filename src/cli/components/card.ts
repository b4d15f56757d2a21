/**
 * ASCII card renderer for analysis results
 * Creates a screenshot-friendly summary card
 */

import chalk from 'chalk';
import type { AnalysisReport, RiskLevel } from '../../types.js';

export interface RiskBreakdown {
  critical: number;
  high: number;
  medium: number;
  low: number;
  total: number;
}

export interface CardData {
  planName: string;
  duration: number; // ms
  report: AnalysisReport;
}

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeRight: '├',
  teeLeft: '┤',
};

const LEVELS: RiskLevel[] = ['critical', 'high', 'medium', 'low'];

function line(char: string, width: number): string {
  return char.repeat(width);
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\u001b\[\d+(;\d+)*m/g, '');
}

function padRight(str: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(str).length);
  return str + ' '.repeat(padding);
}

function row(content: string, width: number): string {
  return BOX.vertical + '  ' + padRight(content, width - 4) + '  ' + BOX.vertical;
}

function divider(width: number): string {
  return BOX.teeRight + line(BOX.horizontal, width) + BOX.teeLeft;
}

function topBorder(width: number): string {
  return BOX.topLeft + line(BOX.horizontal, width) + BOX.topRight;
}

function bottomBorder(width: number): string {
  return BOX.bottomLeft + line(BOX.horizontal, width) + BOX.bottomRight;
}

export function riskColor(level: RiskLevel): (s: string) => string {
  const colors: Record<RiskLevel, (s: string) => string> = {
    critical: chalk.red,
    high: chalk.yellow,
    medium: chalk.blue,
    low: chalk.dim,
  };
  return colors[level];
}

function riskDot(level: RiskLevel): string {
  return riskColor(level)('●');
}

function formatNumber(n: number): string {
  return String(n).padStart(3);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

export function riskBreakdown(report: AnalysisReport): RiskBreakdown {
  const breakdown: RiskBreakdown = { critical: 0, high: 0, medium: 0, low: 0, total: 0 };
  for (const analysis of report.analyses) {
    breakdown[analysis.riskLevel]++;
    breakdown.total++;
  }
  return breakdown;
}

/**
 * Render an analysis result card
 *
 * ┌─────────────────────────────────────────────────────────────┐
 * │  PLAN ANALYSIS COMPLETE                                     │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Plan          plan.json                                    │
 * │  Duration      120ms                                        │
 * │  Resources     42 changes | 3 errors                        │
 * ├─────────────────────────────────────────────────────────────┤
 * │  RISK                          ACTIONS                      │
 * │  ● Critical    1               + Create     10              │
 * │  ● High        4               ~ Update     25              │
 * │  ● Medium      9               - Delete      3              │
 * │  ● Low        28               ± Replace     4              │
 * │  ─────────────                 ─────────────                │
 * │  Dangerous    14               No-op         0              │
 * └─────────────────────────────────────────────────────────────┘
 */
export function renderReportCard(data: CardData): string {
  const width = 61; // Inner width (excluding border chars)
  const lines: string[] = [];
  const { statistics, errors } = data.report;
  const risk = riskBreakdown(data.report);

  lines.push(topBorder(width));
  lines.push(row(chalk.bold.red('PLAN ANALYSIS COMPLETE'), width));
  lines.push(divider(width));

  lines.push(row(`${chalk.dim('Plan')}          ${data.planName}`, width));
  lines.push(row(`${chalk.dim('Duration')}      ${formatDuration(data.duration)}`, width));
  lines.push(row(`${chalk.dim('Resources')}     ${statistics.total} changes | ${errors.length} errors`, width));
  lines.push(divider(width));

  lines.push(row(`${chalk.bold('RISK')}                          ${chalk.bold('ACTIONS')}`, width));

  const actions: Array<[string, number]> = [
    ['+ Create ', statistics.create],
    ['~ Update ', statistics.update],
    ['- Delete ', statistics.delete],
    ['± Replace', statistics.replace],
  ];
  LEVELS.forEach((level, i) => {
    const riskLine = `${riskDot(level)} ${level.charAt(0).toUpperCase() + level.slice(1).padEnd(8)} ${formatNumber(risk[level])}`;
    const [label, count] = actions[i];
    lines.push(row(`${riskLine}               ${label}   ${formatNumber(count)}`, width));
  });

  lines.push(row(`${chalk.dim('─'.repeat(13))}                 ${chalk.dim('─'.repeat(13))}`, width));

  const dangerous = `Dangerous    ${formatNumber(statistics.dangerousCount)}`;
  const noOp = `No-op        ${formatNumber(statistics.noOp)}`;
  lines.push(row(`${chalk.bold(dangerous)}               ${chalk.bold(noOp)}`, width));
  lines.push(bottomBorder(width));

  return lines.join('\n');
}
