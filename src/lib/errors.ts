/** Error categories for the agent CLI */
export const ErrorCode = {
  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Agent error with code and optional remediation hint */
export class AgentError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'AgentError';
  }
}
