import { describe, it, expect } from 'vitest';
import { runTask } from '../src/runner/runner.js';
import { CancellationToken } from '../src/runner/cancellation.js';
import { TASKS } from '../src/tasks/index.js';
import type { AgentTask } from '../src/tasks/types.js';
import { testContext } from './helpers/test-context.js';

const ctx = testContext();

async function play(task: AgentTask, delay = 1, cancelOnSleep?: number) {
  const token = new CancellationToken();
  const out = ctx.output();
  const recorder = ctx.recordingSleep((_ms, call) => {
    if (call === cancelOnSleep) token.cancel('SIGTERM');
  });
  const finished = await runTask(task, { delay, token, output: out, sleep: recorder.sleep });
  return { finished, lines: out.lines, sleeps: recorder.calls };
}

describe('TASKS', () => {
  it('registers every task under its own name', () => {
    expect(Object.keys(TASKS)).toEqual(['count', 'analyze', 'process']);
    for (const [name, task] of Object.entries(TASKS)) {
      expect(task.name).toBe(name);
    }
  });
});

// ── count ──

describe('count task', () => {
  it('counts 1..20 then reports success', async () => {
    const { finished, lines, sleeps } = await play(TASKS.count);

    const counts = Array.from({ length: 20 }, (_, i) => `Count: ${i + 1}/20`);
    expect(finished).toBe(true);
    expect(lines).toEqual([
      '[INFO] Starting counting task...',
      ...counts,
      '[SUCCESS] Counting task completed!',
    ]);
    expect(sleeps).toEqual(Array(20).fill(1000));
  });

  it('stops at the next count once interrupted', async () => {
    const { finished, lines } = await play(TASKS.count, 1, 3);

    expect(finished).toBe(false);
    expect(lines).toEqual([
      '[INFO] Starting counting task...',
      'Count: 1/20',
      'Count: 2/20',
      'Count: 3/20',
    ]);
  });
});

// ── analyze ──

describe('analyze task', () => {
  it('prints 8 steps with insights after steps 3 to 5', async () => {
    const { finished, lines, sleeps } = await play(TASKS.analyze, 0.5);

    expect(finished).toBe(true);
    expect(lines).toEqual([
      '[INFO] Starting analysis task...',
      '[1/8] Loading data...',
      '[2/8] Preprocessing data...',
      '[3/8] Analyzing patterns...',
      '  → Found 42 patterns',
      '[4/8] Computing statistics...',
      '  → Mean: 123.45, Median: 118.20',
      '[5/8] Generating insights...',
      '  → Key insight: Trend is increasing by 15%',
      '[6/8] Validating results...',
      '[7/8] Preparing report...',
      '[8/8] Finalizing analysis...',
      '[SUCCESS] Analysis completed successfully!',
      '[RESULT] Overall score: 87.5/100',
    ]);
    expect(sleeps).toEqual(Array(8).fill(500));
  });

  it('keeps the insight of the step in flight when interrupted', async () => {
    const { finished, lines } = await play(TASKS.analyze, 1, 4);

    expect(finished).toBe(false);
    expect(lines.slice(-2)).toEqual([
      '[4/8] Computing statistics...',
      '  → Mean: 123.45, Median: 118.20',
    ]);
    expect(lines).not.toContain('[RESULT] Overall score: 87.5/100');
  });
});

// ── process ──

describe('process task', () => {
  const files = ['data_001.csv', 'data_002.csv', 'data_003.csv', 'data_004.csv', 'data_005.csv'];

  it('processes 5 files through 5 stages each', async () => {
    const { finished, lines } = await play(TASKS.process);

    const perFile = (file: string, i: number) => [
      `[${i + 1}/5] Processing ${file}...`,
      '  • Reading... OK',
      '  • Parsing... OK',
      '  • Transforming... OK',
      '  • Validating... OK',
      '  • Writing... OK',
      `  ✓ ${file} processed successfully`,
    ];

    expect(finished).toBe(true);
    expect(lines).toEqual([
      '[INFO] Starting data processing task...',
      ...files.flatMap(perFile),
      '[SUCCESS] All files processed!',
      '[RESULT] Processed 5 files, 0 errors',
    ]);
  });

  it('waits half the delay per file and a fifth per stage', async () => {
    const { sleeps } = await play(TASKS.process, 1);

    expect(sleeps).toHaveLength(30);
    expect(sleeps.slice(0, 6)).toEqual([500, 200, 200, 200, 200, 200]);
  });

  it('stops between stages without marking the file processed', async () => {
    // sleep 9 follows the second stage of the second file
    const { finished, lines } = await play(TASKS.process, 1, 9);

    expect(finished).toBe(false);
    expect(lines.slice(-3)).toEqual([
      '[2/5] Processing data_002.csv...',
      '  • Reading... OK',
      '  • Parsing... OK',
    ]);
    expect(lines).toContain('  ✓ data_001.csv processed successfully');
    expect(lines).not.toContain('  ✓ data_002.csv processed successfully');
  });
});
