import { ZodError } from 'zod';
import { AgentError, ErrorCode } from '../lib/errors.js';
import { agentConfigSchema, MAX_DELAY, TASK_NAMES, type AgentConfig } from './types.js';

// ── Error formatting ──

export function formatConfigError(error: ZodError): string {
  const lines: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');

    if (path === 'task' && issue.code === 'invalid_enum_value') {
      lines.push(`✗ task must be one of: ${TASK_NAMES.join(', ')}`);
      continue;
    }

    lines.push(`✗ ${path || 'config'}: ${issue.message}`);
  }

  return lines.join('\n');
}

// ── Delay parsing ──

const DECIMAL_PATTERN = /^\d*\.?\d+(e[+-]?\d+)?$/i;

/**
 * Parse a delay given in decimal seconds. Returns null for anything else,
 * and for delays above MAX_DELAY.
 */
export function parseDelay(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const seconds = Number(trimmed);
  if (seconds > MAX_DELAY) return null;
  return seconds;
}

// ── Config loading ──

/** Validate a raw option bag into an immutable AgentConfig */
export function loadConfig(raw: unknown): Readonly<AgentConfig> {
  const result = agentConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new AgentError(
      ErrorCode.CONFIG_INVALID,
      formatConfigError(result.error),
      'Run: demo-agent --help',
    );
  }
  return Object.freeze(result.data);
}
