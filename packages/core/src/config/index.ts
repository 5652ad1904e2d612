export type { ReleaseConfig, ReleaseSettings, SettingsFile, ReleaseEnvironment } from './config.types';
export { DEFAULT_RELEASE_CONFIG, createReleaseConfig } from './release_config';
export {
  DEFAULT_EDITOR,
  DEFAULT_SETTINGS,
  SETTINGS_FILE,
  SETTINGS_SCHEMA,
  loadSettings,
  parseSettings,
  resolveSettings,
} from './settings';
export type { SettingsContext } from './settings';
export { parseRepository, readEnvironment } from './environment';
export { SettingsError } from './errors';
