/**
 * LevelState - 레벨 하나의 lifecycle 상태.
 *
 *   NONE → LOADING → LOADED → ACTIVATING → ACTIVE → DEACTIVATED
 *                      │                               │
 *                      └──────────► UNLOADING ◄────────┘ → NONE
 *
 * NONE은 초기 상태이자 unload가 끝난 레벨이 돌아오는 상태다.
 * 동시에 두 상태를 가질 일은 없으므로 bit-flag가 아닌 닫힌 enum으로 둔다.
 */
export enum LevelState {
    /** 로드되지 않음 (초기 / unload 완료) */
    NONE = 'NONE',

    /** segment fetch 중 */
    LOADING = 'LOADING',

    /** 모든 segment가 staged, finalize 대기 */
    LOADED = 'LOADED',

    /** staged segment를 scene에 추가하는 중 */
    ACTIVATING = 'ACTIVATING',

    /** 사용 중인 유일한 레벨 */
    ACTIVE = 'ACTIVE',

    /** root node가 제거됨, segment는 아직 남아 있음 */
    DEACTIVATED = 'DEACTIVATED',

    /** segment unload 중 */
    UNLOADING = 'UNLOADING',
}

export type LevelTransition = 'load' | 'activate' | 'deactivate' | 'unload';

export interface TransitionRule {
    /** 전이를 시작할 수 있는 상태 */
    readonly from: readonly LevelState[];

    /** 진행 중 상태 (동기 전이는 null) */
    readonly via: LevelState | null;

    /** 완료 상태 */
    readonly to: LevelState;
}

export const TRANSITION_TABLE: Readonly<Record<LevelTransition, TransitionRule>> = {
    load: { from: [LevelState.NONE], via: LevelState.LOADING, to: LevelState.LOADED },
    activate: { from: [LevelState.LOADED], via: LevelState.ACTIVATING, to: LevelState.ACTIVE },
    deactivate: { from: [LevelState.ACTIVE], via: null, to: LevelState.DEACTIVATED },
    unload: {
        from: [LevelState.DEACTIVATED, LevelState.LOADED],
        via: LevelState.UNLOADING,
        to: LevelState.NONE,
    },
};

export function canBeginTransition(transition: LevelTransition, state: LevelState): boolean {
    return TRANSITION_TABLE[transition].from.includes(state);
}

/**
 * state가 진행 중 상태라면 해당 전이를 반환
 */
export function inFlightTransition(state: LevelState): LevelTransition | null {
    switch (state) {
        case LevelState.LOADING:
            return 'load';
        case LevelState.ACTIVATING:
            return 'activate';
        case LevelState.UNLOADING:
            return 'unload';
        default:
            return null;
    }
}

export function isInFlightState(state: LevelState): boolean {
    return inFlightTransition(state) !== null;
}
