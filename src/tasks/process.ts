import type { AgentTask } from './types.js';

const FILES = [
  'data_001.csv',
  'data_002.csv',
  'data_003.csv',
  'data_004.csv',
  'data_005.csv',
];

const STAGES = ['Reading', 'Parsing', 'Transforming', 'Validating', 'Writing'];

// Fractions of the base delay
const FILE_PAUSE = 0.5;
const STAGE_PAUSE = 0.2;

export const processTask: AgentTask = {
  name: 'process',
  intro: '[INFO] Starting data processing task...',
  steps: FILES.map((file, i) => ({
    line: `[${i + 1}/${FILES.length}] Processing ${file}...`,
    pause: FILE_PAUSE,
    children: STAGES.map((stage) => ({ line: `  • ${stage}... OK`, pause: STAGE_PAUSE })),
    done: `  ✓ ${file} processed successfully`,
  })),
  completion: [
    '[SUCCESS] All files processed!',
    `[RESULT] Processed ${FILES.length} files, 0 errors`,
  ],
};
