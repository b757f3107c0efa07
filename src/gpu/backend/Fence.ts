export type FenceState = 'pending' | 'signaled' | 'failed';

/**
 * Completion signal for submitted device work. Signals at most once; a
 * failed fence rejects every waiter with the failure reason.
 */
export class Fence {
  readonly label: string;
  private currentState: FenceState = 'pending';
  private failure: unknown = null;
  private readonly done: Promise<void>;
  private resolveDone: () => void = () => undefined;
  private rejectDone: (reason: unknown) => void = () => undefined;

  constructor(label: string) {
    this.label = label;
    this.done = new Promise<void>((resolve, reject) => {
      this.resolveDone = resolve;
      this.rejectDone = reject;
    });
    // Failures reach callers through wait(); nobody waiting is not an error
    void this.done.catch(() => undefined);
  }

  /**
   * Already-signaled fence, for arenas returned without any device work
   */
  static signaled(label: string = 'signaled'): Fence {
    const fence = new Fence(label);
    fence.signal();
    return fence;
  }

  /**
   * Fence that signals when `work` resolves and fails when it rejects
   */
  static after(work: Promise<unknown>, label: string): Fence {
    const fence = new Fence(label);
    void work.then(
      () => fence.signal(),
      (error: unknown) => fence.fail(error)
    );
    return fence;
  }

  get state(): FenceState {
    return this.currentState;
  }

  get isSignaled(): boolean {
    return this.currentState === 'signaled';
  }

  get error(): unknown {
    return this.failure;
  }

  signal(): void {
    if (this.currentState !== 'pending') return;
    this.currentState = 'signaled';
    this.resolveDone();
  }

  fail(error: unknown): void {
    if (this.currentState !== 'pending') return;
    this.currentState = 'failed';
    this.failure = error;
    this.rejectDone(error);
  }

  wait(): Promise<void> {
    return this.done;
  }
}
