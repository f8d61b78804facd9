export {
  DEFAULT_MODEL, PipelineSettingsSchema, loadSettings, parseSettings,
} from './settings.js';
export type { PipelineSettings, PipelineSettingsInput } from './settings.js';
export { createSnapshotStore, loadRuntimeEnvironment } from './environment.js';
export type { RuntimeEnvironment, SnapshotBackend } from './environment.js';
