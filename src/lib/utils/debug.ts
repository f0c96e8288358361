import chalk from 'chalk';

/** Debug logger gated by DEMO_AGENT_DEBUG env var (`*` or a namespace prefix) */
export function debug(namespace: string, ...args: unknown[]): void {
  const filter = process.env.DEMO_AGENT_DEBUG ?? '';
  if (!filter) return;
  if (filter === '*' || namespace.startsWith(filter.replace('*', ''))) {
    console.error(chalk.dim(`[DEBUG] [${namespace}]`), ...args);
  }
}
