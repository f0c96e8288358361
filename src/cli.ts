import { Command, InvalidArgumentError, Option } from 'commander';
import {
  DEFAULT_DELAY,
  DEFAULT_TASK,
  MAX_DELAY,
  TASK_NAMES,
  loadConfig,
  parseDelay,
} from './config/index.js';
import { withErrorHandler } from './lib/command/with-error-handler.js';
import { consoleOutput, type Output } from './lib/output.js';
import { debug } from './lib/utils/debug.js';
import {
  CancellationToken,
  installShutdownHandlers,
  runAgent,
  type SignalSource,
  type Sleep,
} from './runner/index.js';

export interface CliOptions {
  output?: Output;
  sleep?: Sleep;
  signals?: SignalSource;
  exit?: (code: number) => void;
}

function delayOption(value: string): number {
  const seconds = parseDelay(value);
  if (seconds === null) {
    throw new InvalidArgumentError(`Delay must be a decimal number of seconds from 0 to ${MAX_DELAY}.`);
  }
  return seconds;
}

/** Build the demo-agent command. `index.ts` parses process.argv with it. */
export function createProgram(options: CliOptions = {}): Command {
  const output = options.output ?? consoleOutput;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  return new Command('demo-agent')
    .description('Simulated long-running agent for exercising process supervisors')
    .version('0.1.0')
    .addOption(
      new Option('-t, --task <name>', 'task to perform')
        .choices(TASK_NAMES)
        .default(DEFAULT_TASK)
        .env('DEMO_AGENT_TASK'),
    )
    .addOption(
      new Option('-d, --delay <seconds>', 'delay between outputs in seconds')
        .argParser(delayOption)
        .default(DEFAULT_DELAY)
        .env('DEMO_AGENT_DELAY'),
    )
    .action(
      withErrorHandler(async (opts: Record<string, unknown>) => {
        const config = loadConfig(opts);
        debug('cli', 'resolved config', config);

        const token = new CancellationToken();
        const dispose = installShutdownHandlers(token, output, options.signals);
        const result = await runAgent(config, { token, output, sleep: options.sleep })
          .finally(dispose);
        debug('cli', `run ${result.status}`);

        exit(result.exitCode);
      }),
    );
}
