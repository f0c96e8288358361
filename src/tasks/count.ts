import type { AgentTask } from './types.js';

const TOTAL = 20;

export const countTask: AgentTask = {
  name: 'count',
  intro: '[INFO] Starting counting task...',
  steps: Array.from({ length: TOTAL }, (_, i) => ({
    line: `Count: ${i + 1}/${TOTAL}`,
    pause: 1,
  })),
  completion: ['[SUCCESS] Counting task completed!'],
};
