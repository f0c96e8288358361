export { runAgent, runTask, type RunAgentOptions } from './runner.js';
export { CancellationToken } from './cancellation.js';
export { installShutdownHandlers, SHUTDOWN_SIGNALS, INTERRUPT_MESSAGE, type SignalSource } from './shutdown.js';
export { sleep, type Sleep } from './sleep.js';
export type { RunResult, TaskContext } from './types.js';
export { BANNER_RULE, BANNER_TITLE, formatDelay } from './types.js';
