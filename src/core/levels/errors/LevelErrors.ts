/**
 * Level loader error taxonomy.
 *
 * 어떤 에러도 orchestrator 공개 API 밖으로 throw되지 않는다.
 * 로그 + 결과 객체(outcome, error)로만 전달된다.
 */

import type { LevelState, LevelTransition } from '../protocol/LevelState';

export type LevelErrorCode =
    | 'CONFIGURATION'
    | 'STATE_CONFLICT'
    | 'RESOURCE_FAULT'
    | 'INVARIANT_VIOLATION';

export type SegmentOperationKind = 'load' | 'unload';

export abstract class LevelLoaderError extends Error {
    abstract readonly code: LevelErrorCode;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * 레벨 이름을 찾을 수 없거나 정의가 잘못됨
 */
export class ConfigurationError extends LevelLoaderError {
    readonly code = 'CONFIGURATION' as const;
    readonly levelName: string | null;

    constructor(message: string, levelName: string | null = null) {
        super(message);
        this.levelName = levelName;
    }
}

/**
 * 현재 상태에서 시작할 수 없는 전이 요청
 */
export class StateConflictError extends LevelLoaderError {
    readonly code = 'STATE_CONFLICT' as const;
    readonly levelName: string;
    readonly transition: LevelTransition | 'activateAndUnloadOthers';
    readonly state: LevelState;

    constructor(
        levelName: string,
        transition: LevelTransition | 'activateAndUnloadOthers',
        state: LevelState
    ) {
        super(`Cannot ${transition} level '${levelName}' while it is in state ${state}`);
        this.levelName = levelName;
        this.transition = transition;
        this.state = state;
    }
}

/**
 * segment load/unload 실패. 재시도는 호출자가 같은 전이를 다시 요청해서 한다.
 */
export class ResourceFault extends LevelLoaderError {
    readonly code = 'RESOURCE_FAULT' as const;
    readonly segmentId: string;
    readonly operation: SegmentOperationKind;

    constructor(segmentId: string, operation: SegmentOperationKind, cause: Error) {
        super(`Segment '${segmentId}' failed to ${operation}: ${cause.message}`, { cause });
        this.segmentId = segmentId;
        this.operation = operation;
    }
}

/**
 * orchestrator 자체가 유효하지 않음 (중복 인스턴스, dispose 이후 호출)
 */
export class InvariantViolation extends LevelLoaderError {
    readonly code = 'INVARIANT_VIOLATION' as const;

    constructor(message: string) {
        super(message);
    }
}

export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
