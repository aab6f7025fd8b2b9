/**
 * @file memloop
 *
 * Append-only context log and SHA-256 integrity fingerprints, with
 * per-user sessions, short-term to long-term consolidation and a
 * request dispatcher for command-line callers.
 *
 * @module
 */

export * from './context/index.js';
export * from './integrity/index.js';
export * from './memory/index.js';
export * from './dispatch/index.js';
export { SessionRegistry, userKey_normalize, ANONYMOUS_USER } from './session/SessionRegistry.js';
export { MemoryBus } from './bus/MemoryBus.js';
export type { MemoryEvent, MemoryObserver } from './bus/types.js';
export { SettingsService, SettingsOverridesSchema, SETTINGS_KEYS } from './config/settings.js';
export type {
    UserSettings,
    SettingsKey,
    ResolvedUserSettings,
    SettingSource,
    SettingSetResult,
    OverridesLoadResult,
} from './config/settings.js';
