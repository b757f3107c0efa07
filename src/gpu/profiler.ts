/**
 * FrameProfiler - rolling per-stage timing summary
 *
 * Plug `hook()` into a Renderer's `onStageTiming`. Keeps the most recent
 * samples per stage and reports average and p95 durations.
 */

import type { ProgramStageName, StageTiming, StageTimingHook } from './types';

export interface StageTimingSummary {
  stage: ProgramStageName;
  samples: number;
  avgMs: number;
  p95Ms: number;
  maxMs: number;
}

const DEFAULT_WINDOW = 100;

export class FrameProfiler {
  private samples = new Map<ProgramStageName, number[]>();
  private frames = new Set<number>();
  private enabled = true;
  private readonly window: number;

  constructor(options: { window?: number } = {}) {
    this.window = Math.max(1, Math.floor(options.window ?? DEFAULT_WINDOW));
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  record(timing: StageTiming): void {
    if (!this.enabled) return;

    let durations = this.samples.get(timing.stage);
    if (!durations) {
      durations = [];
      this.samples.set(timing.stage, durations);
    }
    durations.push(timing.durationMs);
    // Keep only recent samples (rolling window)
    if (durations.length > this.window) {
      durations.shift();
    }
    this.frames.add(timing.frameId);
  }

  hook(): StageTimingHook {
    return (timing) => this.record(timing);
  }

  /**
   * Frames that reported at least one timing since the last clear
   */
  get frameCount(): number {
    return this.frames.size;
  }

  getSummary(): StageTimingSummary[] {
    const sum = (arr: number[]) => arr.reduce((a, b) => a + b, 0);
    const result: StageTimingSummary[] = [];
    for (const [stage, durations] of this.samples) {
      if (durations.length === 0) continue;
      const sorted = [...durations].sort((a, b) => a - b);
      const p95Index = Math.floor(sorted.length * 0.95);
      result.push({
        stage,
        samples: sorted.length,
        avgMs: sum(sorted) / sorted.length,
        p95Ms: sorted[p95Index] ?? sorted[sorted.length - 1] ?? 0,
        maxMs: sorted[sorted.length - 1] ?? 0,
      });
    }
    return result;
  }

  clear(): void {
    this.samples.clear();
    this.frames.clear();
  }
}
