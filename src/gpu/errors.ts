import type { BufferName } from './types';

export type RenderErrorCode =
  | 'estimation'
  | 'arena-overflow'
  | 'render-overflow'
  | 'device-lost'
  | 'unsupported-config'
  | 'allocation'
  | 'cancelled';

export class RenderError extends Error {
  readonly code: RenderErrorCode;

  constructor(code: RenderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Scene summary is inconsistent, or disagrees with the encoded bytes.
 * Raised before any buffer is allocated for the frame.
 */
export class EstimationError extends RenderError {
  constructor(message: string) {
    super('estimation', `[ResourceEstimator] ${message}`);
  }
}

/**
 * A buffer needed more room than its arena or region provides.
 * Internal signal: the renderer answers it with one resize-and-retry.
 */
export class ArenaOverflow extends RenderError {
  readonly requested: number;
  readonly available: number;
  readonly buffer: BufferName | null;

  constructor(args: { requested: number; available: number; buffer?: BufferName | null }) {
    const label = args.buffer ?? 'arena';
    super(
      'arena-overflow',
      `[BufferArena] ${label} overflow (requested=${args.requested}, available=${args.available})`
    );
    this.requested = args.requested;
    this.available = args.available;
    this.buffer = args.buffer ?? null;
  }
}

/**
 * The single permitted retry overflowed again
 */
export class RenderOverflow extends RenderError {
  readonly overflow: ArenaOverflow;

  constructor(overflow: ArenaOverflow) {
    super('render-overflow', `[Renderer] overflow persisted after resize: ${overflow.message}`, {
      cause: overflow,
    });
    this.overflow = overflow;
  }
}

/**
 * The device is gone. The context that owns it cannot be used again.
 */
export class DeviceLost extends RenderError {
  readonly reason: string;

  constructor(reason: string) {
    super('device-lost', `[RenderContext] device lost: ${reason}`);
    this.reason = reason;
  }
}

export class UnsupportedConfig extends RenderError {
  constructor(message: string) {
    super('unsupported-config', `[Renderer] unsupported config: ${message}`);
  }
}

/**
 * The device refused an allocation (byte budget or size limit)
 */
export class AllocationError extends RenderError {
  readonly requested: number;

  constructor(requested: number, message: string) {
    super('allocation', message);
    this.requested = requested;
  }
}

export class RenderCancelled extends RenderError {
  constructor() {
    super('cancelled', '[Renderer] render cancelled before submission');
  }
}
