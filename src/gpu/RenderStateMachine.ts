/**
 * Lifecycle of one render call
 *
 *   idle -> estimating -> planning -> dispatching -> completed -> idle
 *                                         |
 *                                    overflowed -> resizing -> dispatching
 *
 * `estimating -> completed` is the empty-scene clear. Any active state may
 * move to `failed`, which returns to `idle`.
 */

export type RenderState =
  | 'idle'
  | 'estimating'
  | 'planning'
  | 'dispatching'
  | 'overflowed'
  | 'resizing'
  | 'completed'
  | 'failed';

const TRANSITIONS: Record<RenderState, readonly RenderState[]> = {
  idle: ['estimating'],
  estimating: ['planning', 'completed', 'failed'],
  planning: ['dispatching', 'failed'],
  dispatching: ['completed', 'overflowed', 'failed'],
  overflowed: ['resizing', 'failed'],
  resizing: ['dispatching', 'failed'],
  completed: ['idle'],
  failed: ['idle'],
};

export class RenderStateMachine {
  private current: RenderState = 'idle';
  private readonly visited: RenderState[] = ['idle'];
  private retries = 0;

  get state(): RenderState {
    return this.current;
  }

  /**
   * Every state entered so far, starting with `idle`
   */
  get history(): readonly RenderState[] {
    return this.visited;
  }

  get retryCount(): number {
    return this.retries;
  }

  canTransition(next: RenderState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: RenderState): void {
    if (!this.canTransition(next)) {
      throw new Error(`[RenderStateMachine] invalid transition ${this.current} -> ${next}`);
    }
    if (next === 'resizing') {
      // A second overflow is fatal, never another resize
      if (this.retries >= 1) {
        throw new Error('[RenderStateMachine] only one resize is allowed per render');
      }
      this.retries += 1;
    }
    this.current = next;
    this.visited.push(next);
  }

  /**
   * Move to `failed` from wherever the render stopped. No-op once settled.
   */
  fail(): void {
    if (this.current === 'idle' || this.current === 'completed' || this.current === 'failed') {
      return;
    }
    this.transition('failed');
  }
}
