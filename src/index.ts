export * from './gpu';
export { SceneEncoder } from './encoding/SceneEncoder';
export type { GlyphPlacement } from './encoding/SceneEncoder';
export { circlePath, polygon, rectPath, translatePath } from './encoding/path';
export type { FillRule, FlattenedPath, LineSegment, Point } from './encoding/path';
export {
  DEFAULT_RENDERER_SETTINGS,
  createRendererSettingsStore,
  loadRendererSettings,
  saveRendererSettings,
} from './stores/settings';
export type { RendererSettings, RendererSettingsStore } from './stores/settings';
