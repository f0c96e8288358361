import type { Step } from '../lib/ui/step-runner.js';
import type { AgentTask } from './types.js';

const LABELS = [
  'Loading data...',
  'Preprocessing data...',
  'Analyzing patterns...',
  'Computing statistics...',
  'Generating insights...',
  'Validating results...',
  'Preparing report...',
  'Finalizing analysis...',
];

/** Synthetic findings, keyed by 1-based step number */
const INSIGHTS: Record<number, string> = {
  3: '  → Found 42 patterns',
  4: '  → Mean: 123.45, Median: 118.20',
  5: '  → Key insight: Trend is increasing by 15%',
};

const steps: Step[] = LABELS.map((label, i) => {
  const insight = INSIGHTS[i + 1];
  return {
    line: `[${i + 1}/${LABELS.length}] ${label}`,
    pause: 1,
    ...(insight !== undefined ? { notes: [insight] } : {}),
  };
});

export const analyzeTask: AgentTask = {
  name: 'analyze',
  intro: '[INFO] Starting analysis task...',
  steps,
  completion: [
    '[SUCCESS] Analysis completed successfully!',
    '[RESULT] Overall score: 87.5/100',
  ],
};
