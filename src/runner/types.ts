import type { Output } from '../lib/output.js';
import type { StepContext } from '../lib/ui/step-runner.js';
import type { CancellationToken } from './cancellation.js';
import type { Sleep } from './sleep.js';

/** Outcome of a whole run; the CLI maps exitCode onto the process */
export type RunResult =
  | { status: 'completed'; exitCode: 0 }
  | { status: 'interrupted'; exitCode: 1; reason: string | null }
  | { status: 'failed'; exitCode: 1; error: string };

/** Everything a task sequence needs while it runs */
export interface TaskContext extends StepContext {
  token: CancellationToken;
  output: Output;
  sleep: Sleep;
}

/** `2` → `2.0`, `0.5` → `0.5` */
export function formatDelay(seconds: number): string {
  return Number.isInteger(seconds) ? seconds.toFixed(1) : String(seconds);
}

export const BANNER_RULE = '='.repeat(50);

export const BANNER_TITLE = 'AI Agent Example Script';
