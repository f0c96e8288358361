import type { TaskName } from '../config/types.js';
import type { Step } from '../lib/ui/step-runner.js';

/** A canned sequence the agent can play back */
export interface AgentTask {
  name: TaskName;
  /** Printed before the first step */
  intro: string;
  steps: readonly Step[];
  /** Printed only when every step ran */
  completion: readonly string[];
}
