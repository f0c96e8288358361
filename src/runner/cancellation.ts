/**
 * Cooperative stop flag. Set at most once; loops read it at their
 * checkpoints and never get preempted by it.
 */
export class CancellationToken {
  private _reason: string | null = null;

  public get isCancelled(): boolean {
    return this._reason !== null;
  }

  /** What requested the stop (e.g. the signal name), or null */
  public get reason(): string | null {
    return this._reason;
  }

  /** Request a stop. Returns false if one was already requested. */
  public cancel(reason: string): boolean {
    if (this._reason !== null) return false;
    this._reason = reason;
    return true;
  }
}
