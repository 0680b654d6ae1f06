/**
 * TransitionResult - 전이 완료 신호가 resolve하는 값.
 *
 * 핵심 원칙:
 * - completion signal은 절대 reject되지 않는다
 * - 'noop'은 요청이 무시되었음을, 'failed'는 상태가 전진하지 못했음을 뜻한다
 */

import type { LevelLoaderError } from '../errors/LevelErrors';
import type { LevelState, LevelTransition } from './LevelState';

export type TransitionOutcome = 'completed' | 'noop' | 'failed';

export interface TransitionResult {
    levelName: string;
    transition: LevelTransition;
    outcome: TransitionOutcome;

    /** resolve 시점의 레벨 상태 */
    state: LevelState;

    elapsedMs: number;

    error?: LevelLoaderError;
}

export type LevelRequest = 'loadLevel' | 'activateAndUnloadOthers' | 'unloadAll';

/**
 * Orchestrator 공개 API의 결과
 */
export interface LevelRequestResult {
    request: LevelRequest;
    levelName: string | null;
    outcome: TransitionOutcome;
    error?: LevelLoaderError;
}

export function createCompletedResult(
    levelName: string,
    transition: LevelTransition,
    state: LevelState,
    elapsedMs: number
): TransitionResult {
    return { levelName, transition, outcome: 'completed', state, elapsedMs };
}

export function createNoopResult(
    levelName: string,
    transition: LevelTransition,
    state: LevelState,
    error?: LevelLoaderError
): TransitionResult {
    return { levelName, transition, outcome: 'noop', state, elapsedMs: 0, error };
}

export function createFailedResult(
    levelName: string,
    transition: LevelTransition,
    state: LevelState,
    error: LevelLoaderError,
    elapsedMs: number
): TransitionResult {
    return { levelName, transition, outcome: 'failed', state, elapsedMs, error };
}

export function createRequestResult(
    request: LevelRequest,
    levelName: string | null,
    outcome: TransitionOutcome,
    error?: LevelLoaderError
): LevelRequestResult {
    return error ? { request, levelName, outcome, error } : { request, levelName, outcome };
}
