/** What a sequence needs while it runs */
export interface StepContext {
  /** Base delay between lines, in seconds */
  delay: number;
  token: { readonly isCancelled: boolean };
  output: { log(line?: string): void };
  sleep: (ms: number) => Promise<void>;
}

/** A step in a named sequence */
export interface Step {
  /** Printed when the step starts */
  line: string;
  /** Fraction of the base delay to wait after `line` */
  pause: number;
  /** Printed after the pause, as part of the same step */
  notes?: readonly string[];
  /** Sub-steps run after the notes, with the same checkpoint rules */
  children?: readonly Step[];
  /** Printed once every child has run */
  done?: string;
}

/**
 * Run steps top to bottom. The token is checked before each step and each
 * sub-step; a step already under way (its pause and notes) still finishes.
 *
 * Returns true when the sequence ran to completion without a stop request.
 */
export async function runSteps(steps: readonly Step[], ctx: StepContext): Promise<boolean> {
  for (const step of steps) {
    if (ctx.token.isCancelled) return false;

    ctx.output.log(step.line);
    await ctx.sleep(ctx.delay * 1000 * step.pause);

    for (const note of step.notes ?? []) {
      ctx.output.log(note);
    }

    if (step.children) {
      const finished = await runSteps(step.children, ctx);
      if (!finished) return false;
    }

    if (step.done !== undefined) {
      ctx.output.log(step.done);
    }
  }

  return !ctx.token.isCancelled;
}
