/**
 * level-lifecycle
 *
 * Babylon.js scene 위에서 레벨(segment 묶음)을 load / activate / deactivate / unload 한다.
 */

export * from './core/levels';

export { createLevelRuntime } from './app/createLevelRuntime';
export type { LevelRuntime, LevelRuntimeOptions } from './app/createLevelRuntime';
export { runBootSequence } from './app/BootSequence';
export type { BootOptions } from './app/BootSequence';

export { TaggedLogger } from './shared/logging/TaggedLogger';
export type { TaggedLoggerOptions } from './shared/logging/TaggedLogger';
export {
    DEFAULT_LEVEL_LOADER_CONFIG,
    isFlagEnabled,
    resolveLevelLoaderConfig,
} from './shared/config/LevelLoaderConfig';
export type { LevelLoaderConfig } from './shared/config/LevelLoaderConfig';
export { createDeferred, yieldTick } from './shared/async/Deferred';
export type { Deferred } from './shared/async/Deferred';
