/**
 * Core Levels Module
 *
 * 레벨(segment 묶음)을 working set에 올리고 내리는 lifecycle.
 *
 * Level States:
 *   NONE → LOADING → LOADED → ACTIVATING → ACTIVE → DEACTIVATED → UNLOADING → NONE
 *
 * Key Rules:
 * - ACTIVE 레벨은 언제나 최대 1개
 * - 전이 완료 신호는 reject되지 않는다 (outcome으로 구분)
 * - persistent container 아래의 node는 어떤 teardown에서도 살아남는다
 */

// ========================================
// Protocol
// ========================================

export { LevelState, TRANSITION_TABLE, canBeginTransition, inFlightTransition, isInFlightState } from './protocol/LevelState';
export type { LevelTransition, TransitionRule } from './protocol/LevelState';

export {
    createCompletedResult,
    createNoopResult,
    createFailedResult,
    createRequestResult,
} from './protocol/TransitionResult';
export type { TransitionOutcome, TransitionResult, LevelRequest, LevelRequestResult } from './protocol/TransitionResult';

// ========================================
// Errors
// ========================================

export {
    LevelLoaderError,
    ConfigurationError,
    StateConflictError,
    ResourceFault,
    InvariantViolation,
    toError,
} from './errors/LevelErrors';
export type { LevelErrorCode, SegmentOperationKind } from './errors/LevelErrors';

// ========================================
// Segments
// ========================================

export { SegmentHandle, FINALIZE_THRESHOLD } from './segment/SegmentHandle';
export { SegmentLoader } from './segment/SegmentLoader';
export type { SegmentLoaderOptions, SegmentPresenceChange } from './segment/SegmentLoader';
export { createProceduralSegmentSource, collectContainerNodes } from './segment/SegmentSource';
export type { SegmentSource, SegmentSourceMap } from './segment/SegmentSource';
export { createFileSegmentSource, splitSegmentUrl, progressFromEvent } from './segment/FileSegmentSource';
export type { ContainerLoadFunction } from './segment/FileSegmentSource';

// ========================================
// Levels
// ========================================

export { Level } from './level/Level';
export type { LevelContext, LevelStateChange } from './level/Level';
export { LevelRegistry } from './registry/LevelRegistry';
export { parseLevelDefinitions, loadLevelDefinitions } from './registry/LevelDefinition';
export type { LevelDefinition } from './registry/LevelDefinition';

// ========================================
// Orchestration
// ========================================

export { LevelOrchestrator } from './orchestrator/LevelOrchestrator';
export type { LevelOrchestratorCallbacks, LevelOrchestratorDeps } from './orchestrator/LevelOrchestrator';
export { PersistentObjectGuard } from './guard/PersistentObjectGuard';
export { SceneLightingRecomputer } from './lighting/LightingRecomputer';
export type { LightingRecomputer } from './lighting/LightingRecomputer';
export { LightingRecomputeScheduler } from './lighting/LightingRecomputeScheduler';
export type { BlockChangeSubscription } from './lighting/LightingRecomputeScheduler';
