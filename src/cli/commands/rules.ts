import * as p from '@clack/prompts';
import chalk from 'chalk';
import { findConfigPath, loadConfig, rulesFromConfig } from '../../core/config.js';
import { buildSensitivityIndex } from '../../core/sensitivity-index.js';
import { errorMessage } from '../../core/errors.js';
import type { SensitivityRule } from '../../types.js';

interface RulesOptions {
  config?: string;
  json: boolean;
}

function describeRule(rule: SensitivityRule): string {
  return rule.kind === 'resource'
    ? `resource  ${rule.resourceType}`
    : `property  ${rule.resourceType}.${rule.property}`;
}

export async function rulesCommand(options: RulesOptions): Promise<void> {
  const cwd = process.cwd();

  let rules: SensitivityRule[];
  try {
    rules = rulesFromConfig(loadConfig(cwd, options.config));
  } catch (error) {
    if (options.json) {
      console.error(JSON.stringify({ error: errorMessage(error) }));
    } else {
      p.log.error(errorMessage(error));
    }
    process.exit(1);
  }

  const { index, errors, warnings } = buildSensitivityIndex(rules);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          resourceRules: index.resourceRuleCount,
          propertyRules: index.propertyRuleCount,
          errors: errors.map((e) => ({ ruleIndex: e.ruleIndex, field: e.field, message: e.message })),
          warnings,
        },
        null,
        2
      )
    );
  } else {
    p.intro(chalk.red('planwarden') + chalk.dim(' - sensitivity rules'));
    p.log.info(`Config: ${options.config ?? findConfigPath(cwd) ?? chalk.dim('(none, using defaults)')}`);

    const invalid = new Set(errors.map((e) => e.ruleIndex));
    rules.forEach((rule, i) => {
      const line = `${String(i).padStart(3)}  ${describeRule(rule)}`;
      console.log(invalid.has(i) ? chalk.red(line) : line);
    });

    for (const error of errors) p.log.error(error.message);
    for (const warning of warnings) p.log.warn(warning);

    p.outro(
      `${index.resourceRuleCount} sensitive resource type(s), ${index.propertyRuleCount} sensitive propert(ies)`
    );
  }

  if (errors.length > 0) {
    process.exit(1);
  }
}
