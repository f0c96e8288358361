import type { TaskName } from '../config/types.js';
import { analyzeTask } from './analyze.js';
import { countTask } from './count.js';
import { processTask } from './process.js';
import type { AgentTask } from './types.js';

export type { AgentTask } from './types.js';

export type TaskRegistry = Readonly<Record<TaskName, AgentTask>>;

export const TASKS: TaskRegistry = {
  count: countTask,
  analyze: analyzeTask,
  process: processTask,
};
