import { beforeEach, describe, expect, it, vi } from 'vitest';

const fsMocks = vi.hoisted(() => ({
  readFile: vi.fn(),
  writeFile: vi.fn(),
  mkdir: vi.fn(),
}));

vi.mock('node:fs/promises', () => ({
  readFile: fsMocks.readFile,
  writeFile: fsMocks.writeFile,
  mkdir: fsMocks.mkdir,
}));

import {
  DEFAULT_RENDERER_SETTINGS,
  clampPoolDepth,
  clampSafetyMargin,
  createRendererSettingsStore,
  loadRendererSettings,
  mergeLoadedRendererSettings,
  saveRendererSettings,
} from '../settings';

const SETTINGS_PATH = '/config/renderer/settings.json';

function missingFileError(): Error {
  return Object.assign(new Error('no such file'), { code: 'ENOENT' });
}

describe('renderer settings store', () => {
  beforeEach(() => {
    fsMocks.readFile.mockReset();
    fsMocks.writeFile.mockReset();
    fsMocks.mkdir.mockReset();
    fsMocks.mkdir.mockResolvedValue(undefined);
    fsMocks.writeFile.mockResolvedValue(undefined);
  });

  it('starts from the defaults', () => {
    const state = createRendererSettingsStore().getState();

    expect(state.estimationMode).toBe('static');
    expect(state.antialiasing).toBe('area');
    expect(state.poolDepth).toBe(2);
    expect(state.staticSafetyMargin).toBe(0.25);
    expect(state.isLoaded).toBe(false);
  });

  it('clamps pool depth and safety margin', () => {
    const store = createRendererSettingsStore();

    store.getState().setPoolDepth(20);
    expect(store.getState().poolDepth).toBe(8);
    store.getState().setPoolDepth(0);
    expect(store.getState().poolDepth).toBe(1);
    store.getState().setPoolDepth(2.6);
    expect(store.getState().poolDepth).toBe(3);

    store.getState().setStaticSafetyMargin(-1);
    expect(store.getState().staticSafetyMargin).toBe(0);
    store.getState().setStaticSafetyMargin(9);
    expect(store.getState().staticSafetyMargin).toBe(4);
  });

  it('falls back to defaults for non-finite values', () => {
    expect(clampPoolDepth(Number.NaN)).toBe(2);
    expect(clampSafetyMargin(Number.POSITIVE_INFINITY)).toBe(0.25);
  });

  it('notifies subscribers with the previous state', () => {
    const store = createRendererSettingsStore();
    const seen: Array<[number, number]> = [];
    store.subscribe((state, previous) => seen.push([previous.poolDepth, state.poolDepth]));

    store.getState().setPoolDepth(4);

    expect(seen).toEqual([[2, 4]]);
  });

  it('merges loaded settings over defaults and drops malformed fields', () => {
    expect(
      mergeLoadedRendererSettings({
        estimationMode: 'dynamic',
        antialiasing: 'supersample',
        poolDepth: 99,
        staticSafetyMargin: 'lots',
      })
    ).toEqual({
      estimationMode: 'dynamic',
      antialiasing: 'area',
      poolDepth: 8,
      staticSafetyMargin: 0.25,
    });
    expect(mergeLoadedRendererSettings([1, 2])).toEqual(DEFAULT_RENDERER_SETTINGS);
  });

  it('loads settings from file', async () => {
    fsMocks.readFile.mockResolvedValueOnce(
      JSON.stringify({ estimationMode: 'dynamic', antialiasing: 'msaa', poolDepth: 3 })
    );
    const store = createRendererSettingsStore();

    await loadRendererSettings(store, SETTINGS_PATH);

    const state = store.getState();
    expect(fsMocks.readFile).toHaveBeenCalledWith(SETTINGS_PATH, 'utf8');
    expect(state.estimationMode).toBe('dynamic');
    expect(state.antialiasing).toBe('msaa');
    expect(state.poolDepth).toBe(3);
    expect(state.staticSafetyMargin).toBe(0.25);
    expect(state.isLoaded).toBe(true);
    expect(fsMocks.writeFile).not.toHaveBeenCalled();
  });

  it('writes defaults when no settings file exists', async () => {
    fsMocks.readFile.mockRejectedValueOnce(missingFileError());
    const store = createRendererSettingsStore({ poolDepth: 5 });

    await loadRendererSettings(store, SETTINGS_PATH);

    expect(store.getState().poolDepth).toBe(2);
    expect(store.getState().isLoaded).toBe(true);
    expect(fsMocks.mkdir).toHaveBeenCalledWith('/config/renderer', { recursive: true });
    expect(fsMocks.writeFile).toHaveBeenCalledWith(
      SETTINGS_PATH,
      JSON.stringify(DEFAULT_RENDERER_SETTINGS, null, 2),
      'utf8'
    );
  });

  it('keeps defaults when the file is not valid JSON', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    fsMocks.readFile.mockResolvedValueOnce('{ not json');
    const store = createRendererSettingsStore();

    await loadRendererSettings(store, SETTINGS_PATH);

    expect(store.getState().isLoaded).toBe(true);
    expect(store.getState().estimationMode).toBe('static');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('keeps defaults when the file cannot be read', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    fsMocks.readFile.mockRejectedValueOnce(Object.assign(new Error('denied'), { code: 'EACCES' }));
    const store = createRendererSettingsStore();

    await loadRendererSettings(store, SETTINGS_PATH);

    expect(store.getState().isLoaded).toBe(true);
    expect(fsMocks.writeFile).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('saves only persisted fields', async () => {
    const store = createRendererSettingsStore();
    store.getState().setEstimationMode('dynamic');

    await expect(saveRendererSettings(store, SETTINGS_PATH)).resolves.toBe(true);

    expect(fsMocks.writeFile).toHaveBeenCalledWith(
      SETTINGS_PATH,
      JSON.stringify(
        {
          estimationMode: 'dynamic',
          antialiasing: 'area',
          poolDepth: 2,
          staticSafetyMargin: 0.25,
        },
        null,
        2
      ),
      'utf8'
    );
  });

  it('reports a failed save without throwing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    fsMocks.writeFile.mockRejectedValueOnce(new Error('disk full'));

    await expect(saveRendererSettings(createRendererSettingsStore(), SETTINGS_PATH)).resolves.toBe(
      false
    );
  });

  it('resets to defaults', () => {
    const store = createRendererSettingsStore({ antialiasing: 'none', poolDepth: 4 });
    store.getState().resetToDefaults();

    expect(store.getState().antialiasing).toBe('area');
    expect(store.getState().poolDepth).toBe(2);
  });
});
