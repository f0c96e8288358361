import type { AgentConfig } from '../config/types.js';
import { consoleOutput, type Output } from '../lib/output.js';
import { runSteps } from '../lib/ui/step-runner.js';
import { debug } from '../lib/utils/debug.js';
import { TASKS, type AgentTask, type TaskRegistry } from '../tasks/index.js';
import { CancellationToken } from './cancellation.js';
import { sleep as timedSleep, type Sleep } from './sleep.js';
import { BANNER_RULE, BANNER_TITLE, formatDelay, type RunResult, type TaskContext } from './types.js';

export interface RunAgentOptions {
  token?: CancellationToken;
  output?: Output;
  sleep?: Sleep;
  tasks?: TaskRegistry;
}

/**
 * Play back the configured task and report how it ended.
 *
 * Never exits the process and never throws for task failures; the caller
 * turns the returned exit code into a process exit.
 */
export async function runAgent(
  config: AgentConfig,
  options: RunAgentOptions = {},
): Promise<RunResult> {
  const output = options.output ?? consoleOutput;
  const token = options.token ?? new CancellationToken();
  const tasks = options.tasks ?? TASKS;

  printBanner(config, output);

  try {
    const ctx: TaskContext = {
      delay: config.delay,
      token,
      output,
      sleep: options.sleep ?? timedSleep,
    };
    await runTask(tasks[config.task], ctx);

    if (token.isCancelled) {
      debug('runner', `task "${config.task}" stopped early (${token.reason})`);
      output.log();
      output.log('[WARNING] Task was interrupted!');
      return { status: 'interrupted', exitCode: 1, reason: token.reason };
    }

    output.log();
    output.log('[INFO] Agent finished successfully');
    return { status: 'completed', exitCode: 0 };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    output.error();
    output.error(`[ERROR] Unexpected error: ${message}`);
    return { status: 'failed', exitCode: 1, error: message };
  }
}

/** Run one task's sequence, printing its completion lines only if it finished */
export async function runTask(task: AgentTask, ctx: TaskContext): Promise<boolean> {
  ctx.output.log(task.intro);

  const finished = await runSteps(task.steps, ctx);
  if (finished) {
    for (const line of task.completion) {
      ctx.output.log(line);
    }
  }
  return finished;
}

function printBanner(config: AgentConfig, output: Output): void {
  output.log(BANNER_RULE);
  output.log(BANNER_TITLE);
  output.log(BANNER_RULE);
  output.log(`Task: ${config.task}`);
  output.log(`Delay: ${formatDelay(config.delay)}s`);
  output.log(BANNER_RULE);
  output.log();
}
