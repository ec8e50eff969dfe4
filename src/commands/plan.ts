// Path: src/commands/plan.ts
// Plan command - prints the supervision tree without starting it

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadClientConfig } from '../lib/config/index.js';
import { maskSensitiveUrl, type Role } from '../lib/websocket/index.js';
import { planSupervision, type SupervisionPlan } from '../services/supervisor/index.js';
import { extractErrorMessage } from '../utils/error.js';
import type { PlanCommandOptions } from './types.js';

export interface PlanSummaryChild {
  id: string;
  kind: 'registry' | 'connection';
  role?: Role;
  url?: string;
}

export interface PlanSummary {
  name: string;
  supervisor: string;
  registry: string;
  host: string;
  protocol: string;
  children: PlanSummaryChild[];
}

/**
 * Printable view of a plan. Transport options are left out and URLs
 * are masked, so the summary never carries credentials.
 */
export function summarizePlan(plan: SupervisionPlan): PlanSummary {
  return {
    name: plan.name,
    supervisor: plan.supervisorName,
    registry: plan.registryName,
    host: plan.host,
    protocol: plan.protocol,
    children: plan.children.map((child): PlanSummaryChild =>
      child.kind === 'registry'
        ? { id: child.id, kind: child.kind }
        : { id: child.id, kind: child.kind, role: child.role, url: maskSensitiveUrl(child.url) }
    ),
  };
}

/**
 * Render a plan summary as human-readable lines
 */
export function formatPlan(summary: PlanSummary): string {
  const lines = [
    `${chalk.bold('Supervisor:')} ${summary.supervisor}`,
    `${chalk.bold('Registry:')}   ${summary.registry}`,
    `${chalk.bold('Gateway:')}    ${summary.protocol}://${summary.host}`,
    '',
    chalk.bold('Children (start order):'),
  ];

  summary.children.forEach((child, index) => {
    const position = `${index + 1}.`.padEnd(4);
    if (child.kind === 'registry') {
      lines.push(`  ${position}${chalk.cyan(child.id)}`);
    } else {
      lines.push(`  ${position}${chalk.cyan(child.id.padEnd(14))}${child.url ?? ''}`);
    }
  });

  return lines.join('\n');
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show the supervision plan for a configuration')
    .option('-c, --config <file>', 'Config file (default: $PULSAR_WS_CONFIG or ./pulsar-ws.json)')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  pulsar-ws-supervisor plan
  pulsar-ws-supervisor plan -c ./orders.json --json
`)
    .action((options: PlanCommandOptions) => {
      let summary: PlanSummary;
      try {
        summary = summarizePlan(planSupervision(loadClientConfig(options.config)));
      } catch (err) {
        console.error(chalk.red('Invalid configuration:'), extractErrorMessage(err));
        process.exit(1);
      }

      if (options.json === true) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      console.log(formatPlan(summary));
    });
}
