/**
 * plan command - dry-run scheduling of a JSON plan of agents and tasks
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import type { CoordinatorConfig } from '../../types.js';
import { Coordinator, priorityName } from '../../coordination/coordinator.js';
import type { UnmetReason } from '../../coordination/scheduler.js';
import { getConfig, loadConfig } from '../../utils/config.js';
import { CreateTaskInputSchema, RegisterAgentInputSchema, validate } from '../../utils/validation.js';
import { errorMessage } from '../../errors.js';

export const PlanFileSchema = z.object({
  agents: z.array(RegisterAgentInputSchema).default([]),
  tasks: z.array(
    CreateTaskInputSchema.omit({ dependencies: true }).extend({
      key: z.string().min(1),
      // Keys of tasks listed earlier in the file
      dependsOn: z.array(z.string().min(1)).default([]),
    })
  ).default([]),
});

export type PlanFile = z.input<typeof PlanFileSchema>;

export interface PlanRound {
  round: number;
  assignments: Array<{ task: string; agent: string }>;
}

export interface PendingEntry {
  task: string;
  title: string;
  priority: string;
  waitingOn: Array<{ task: string; reason: UnmetReason }>;
  requiredCapabilities: string[];
}

export interface PlanReport {
  rounds: PlanRound[];
  completed: string[];
  pending: PendingEntry[];
}

export interface PlanOptions {
  simulate?: boolean;
}

/**
 * Schedule a plan against a fresh coordinator. With `simulate`, every
 * assigned task completes at once and scheduling repeats until nothing moves.
 */
export function runPlan(plan: PlanFile, config: CoordinatorConfig, options: PlanOptions = {}): PlanReport {
  const parsed = PlanFileSchema.parse(plan);
  const coordinator = new Coordinator({ config: { ...config, autoAssignTasks: false } });

  for (const agent of parsed.agents) {
    coordinator.registerAgent(agent);
  }

  const idByKey = new Map<string, string>();
  const keyById = new Map<string, string>();
  for (const { key, dependsOn, ...task } of parsed.tasks) {
    const created = coordinator.createTask({
      ...task,
      // Unknown keys pass through and surface as missing dependencies
      dependencies: dependsOn.map(dep => idByKey.get(dep) ?? dep),
    });
    idByKey.set(key, created.id);
    keyById.set(created.id, key);
  }

  const label = (id: string): string => keyById.get(id) ?? id;
  const rounds: PlanRound[] = [];
  const completed: string[] = [];

  for (let round = 1; round <= parsed.tasks.length; round++) {
    const assignments = coordinator.scheduleTick();
    if (assignments.length === 0) break;

    rounds.push({
      round,
      assignments: assignments.map(({ task, agent }) => ({ task: label(task.id), agent: agent.id })),
    });

    if (!options.simulate) break;

    for (const { task } of assignments) {
      coordinator.completeTask(task.id, 'simulated');
      completed.push(label(task.id));
    }
  }

  const blocked = new Map(coordinator.getBlockedTasks().map(entry => [entry.task.id, entry]));
  const pending = coordinator.listTasks('pending')
    .sort((a, b) => a.sequence - b.sequence)
    .map(task => ({
      task: label(task.id),
      title: task.title,
      priority: priorityName(task.priority),
      waitingOn: (blocked.get(task.id)?.unmetDependencies ?? [])
        .map(dep => ({ task: label(dep.taskId), reason: dep.reason })),
      requiredCapabilities: task.requiredCapabilities,
    }));

  return { rounds, completed, pending };
}

export function formatPlanReport(report: PlanReport): string[] {
  const lines: string[] = [];

  if (report.rounds.length === 0) {
    lines.push('No tasks could be assigned.');
  }
  for (const round of report.rounds) {
    lines.push(`Round ${round.round}:`);
    for (const { task, agent } of round.assignments) {
      lines.push(`  ${task} -> ${agent}`);
    }
  }

  if (report.pending.length > 0) {
    lines.push('', 'Pending:');
    for (const entry of report.pending) {
      const reason = entry.waitingOn.length > 0
        ? `waiting on ${entry.waitingOn.map(dep => `${dep.task} (${dep.reason})`).join(', ')}`
        : `no idle agent with [${entry.requiredCapabilities.join(', ')}]`;
      lines.push(`  ${entry.task} [${entry.priority}] ${reason}`);
    }
  }

  return lines;
}

export function createPlanCommand(): Command {
  return new Command('plan')
    .description('Schedule a JSON plan of agents and tasks without running workers')
    .argument('<file>', 'Plan file')
    .option('-s, --simulate', 'Complete assigned tasks and keep scheduling until nothing moves')
    .option('-c, --config <path>', 'Configuration file')
    .option('--json', 'Output as JSON')
    .action((file: string, options: { simulate?: boolean; config?: string; json?: boolean }) => {
      try {
        const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
        const result = validate(PlanFileSchema, raw);
        if (!result.success) {
          console.error('Invalid plan file:');
          for (const issue of result.errors) {
            console.error(`  - ${issue}`);
          }
          process.exit(1);
          return;
        }

        const config = options.config ? loadConfig(options.config) : getConfig();
        const report = runPlan(result.data, config, { simulate: options.simulate });

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }

        for (const line of formatPlanReport(report)) {
          console.log(line);
        }
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
