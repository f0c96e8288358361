export {
  agentConfigSchema,
  taskNameSchema,
  TASK_NAMES,
  DEFAULT_TASK,
  DEFAULT_DELAY,
  MAX_DELAY,
  type AgentConfig,
  type TaskName,
} from './types.js';
export { loadConfig, parseDelay, formatConfigError } from './parser.js';
