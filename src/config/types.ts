import { z } from 'zod';

export const TASK_NAMES = ['count', 'analyze', 'process'] as const;

export const DEFAULT_TASK = 'count';

/** Seconds between progress lines */
export const DEFAULT_DELAY = 0.5;

/** Longest delay a single timer can hold (2^31-1 ms), in whole seconds */
export const MAX_DELAY = 2_147_483;

export const taskNameSchema = z.enum(TASK_NAMES);

export type TaskName = z.infer<typeof taskNameSchema>;

export const agentConfigSchema = z.object({
  task: taskNameSchema.default(DEFAULT_TASK),
  delay: z.number().finite().nonnegative().max(MAX_DELAY).default(DEFAULT_DELAY),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;
