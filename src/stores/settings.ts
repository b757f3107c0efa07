import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createStore, type StoreApi } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { DEFAULT_SAFETY_MARGIN } from '@/gpu/estimate/costTable';
import { MAX_POOL_DEPTH } from '@/gpu/resources/ArenaPool';
import type { AntialiasingMode, EstimationMode } from '@/gpu/types';

export const ESTIMATION_MODES: readonly EstimationMode[] = ['static', 'dynamic'];
export const ANTIALIASING_MODES: readonly AntialiasingMode[] = ['area', 'msaa', 'none'];

export const MIN_POOL_DEPTH = 1;
export const MAX_SAFETY_MARGIN = 4;

// Settings that are persisted to file
export interface RendererSettings {
  estimationMode: EstimationMode;
  antialiasing: AntialiasingMode;
  /** Frames that may be in flight at once (arena pool depth) */
  poolDepth: number;
  /** Padding applied to static estimates, 0.25 = +25% */
  staticSafetyMargin: number;
}

interface RendererSettingsState extends RendererSettings {
  isLoaded: boolean;

  setEstimationMode: (mode: EstimationMode) => void;
  setAntialiasing: (mode: AntialiasingMode) => void;
  setPoolDepth: (depth: number) => void;
  setStaticSafetyMargin: (margin: number) => void;
  resetToDefaults: () => void;
  /** Replace persisted fields with `loaded`, falling back to defaults */
  applyLoaded: (loaded: unknown) => void;
}

export type RendererSettingsStore = StoreApi<RendererSettingsState>;

export const DEFAULT_RENDERER_SETTINGS: RendererSettings = {
  estimationMode: 'static',
  antialiasing: 'area',
  poolDepth: 2,
  staticSafetyMargin: DEFAULT_SAFETY_MARGIN,
};

export function clampPoolDepth(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_RENDERER_SETTINGS.poolDepth;
  return Math.min(MAX_POOL_DEPTH, Math.max(MIN_POOL_DEPTH, Math.round(value)));
}

export function clampSafetyMargin(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_RENDERER_SETTINGS.staticSafetyMargin;
  return Math.min(MAX_SAFETY_MARGIN, Math.max(0, value));
}

function isEstimationMode(value: unknown): value is EstimationMode {
  return ESTIMATION_MODES.some((mode) => mode === value);
}

function isAntialiasingMode(value: unknown): value is AntialiasingMode {
  return ANTIALIASING_MODES.some((mode) => mode === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge whatever was read from disk over the defaults. Unknown or
 * malformed fields keep their default.
 */
export function mergeLoadedRendererSettings(loaded: unknown): RendererSettings {
  const merged: RendererSettings = { ...DEFAULT_RENDERER_SETTINGS };
  if (!isRecord(loaded)) return merged;

  if (isEstimationMode(loaded.estimationMode)) {
    merged.estimationMode = loaded.estimationMode;
  }
  if (isAntialiasingMode(loaded.antialiasing)) {
    merged.antialiasing = loaded.antialiasing;
  }
  if (typeof loaded.poolDepth === 'number') {
    merged.poolDepth = clampPoolDepth(loaded.poolDepth);
  }
  if (typeof loaded.staticSafetyMargin === 'number') {
    merged.staticSafetyMargin = clampSafetyMargin(loaded.staticSafetyMargin);
  }
  return merged;
}

export function pickRendererSettings(state: RendererSettings): RendererSettings {
  return {
    estimationMode: state.estimationMode,
    antialiasing: state.antialiasing,
    poolDepth: state.poolDepth,
    staticSafetyMargin: state.staticSafetyMargin,
  };
}

export function createRendererSettingsStore(
  initial: Partial<RendererSettings> = {}
): RendererSettingsStore {
  const start = mergeLoadedRendererSettings({ ...DEFAULT_RENDERER_SETTINGS, ...initial });

  return createStore<RendererSettingsState>()(
    immer((set) => ({
      isLoaded: false,
      ...start,

      setEstimationMode: (mode) => {
        set((state) => {
          state.estimationMode = mode;
        });
      },

      setAntialiasing: (mode) => {
        set((state) => {
          state.antialiasing = mode;
        });
      },

      setPoolDepth: (depth) => {
        set((state) => {
          state.poolDepth = clampPoolDepth(depth);
        });
      },

      setStaticSafetyMargin: (margin) => {
        set((state) => {
          state.staticSafetyMargin = clampSafetyMargin(margin);
        });
      },

      resetToDefaults: () => {
        set((state) => {
          Object.assign(state, DEFAULT_RENDERER_SETTINGS);
        });
      },

      applyLoaded: (loaded) => {
        const merged = mergeLoadedRendererSettings(loaded);
        set((state) => {
          Object.assign(state, merged);
          state.isLoaded = true;
        });
      },
    }))
  );
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Load settings from `path`. A missing file keeps the defaults and writes
 * them out; an unreadable one keeps the defaults.
 */
export async function loadRendererSettings(
  store: RendererSettingsStore,
  path: string
): Promise<void> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (!isMissingFile(error)) {
      console.warn(`[RendererSettings] failed to read ${path}, using defaults`, error);
      store.getState().applyLoaded(null);
      return;
    }
    store.getState().applyLoaded(null);
    await saveRendererSettings(store, path);
    return;
  }

  try {
    store.getState().applyLoaded(JSON.parse(content));
  } catch (error) {
    console.warn(`[RendererSettings] ${path} is not valid JSON, using defaults`, error);
    store.getState().applyLoaded(null);
  }
}

export async function saveRendererSettings(
  store: RendererSettingsStore,
  path: string
): Promise<boolean> {
  try {
    await mkdir(dirname(path), { recursive: true });
    const data = pickRendererSettings(store.getState());
    await writeFile(path, JSON.stringify(data, null, 2), 'utf8');
    return true;
  } catch (error) {
    // Non-critical: the renderer keeps running on in-memory settings
    console.warn(`[RendererSettings] failed to save ${path}`, error);
    return false;
  }
}
