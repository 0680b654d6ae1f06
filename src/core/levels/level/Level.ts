/**
 * Level - segment 묶음과 그 lifecycle state machine.
 *
 * 핵심 규칙:
 * - 레벨당 진행 중인 전이는 최대 1개
 * - 같은 전이를 진행 중에 다시 요청하면 진행 중인 completion signal을 그대로 반환
 * - 호환되지 않는 상태에서의 요청은 경고 후 noop 결과 (throw하지 않음)
 * - segment 실패(ResourceFault) 시 상태는 전진하지 않는다
 * - 레벨은 자기 segment 전부를 loader에 holder(레벨 이름)로 붙잡는다.
 *   다른 레벨과 공유하는 segment는 마지막 holder가 놓을 때 내려간다.
 *
 * Level은 다른 Level을 알지 못한다. 형제 레벨과의 순서 조정은 orchestrator 몫이다.
 */

import * as BABYLON from '@babylonjs/core';
import { TaggedLogger } from '../../../shared/logging/TaggedLogger';
import { ResourceFault, StateConflictError } from '../errors/LevelErrors';
import type { PersistentObjectGuard } from '../guard/PersistentObjectGuard';
import { LevelState, canBeginTransition, type LevelTransition } from '../protocol/LevelState';
import {
    createCompletedResult,
    createFailedResult,
    createNoopResult,
    type TransitionResult,
} from '../protocol/TransitionResult';
import type { LevelDefinition } from '../registry/LevelDefinition';
import type { SegmentHandle } from '../segment/SegmentHandle';
import type { SegmentLoader } from '../segment/SegmentLoader';

export interface LevelContext {
    loader: SegmentLoader;
    guard: PersistentObjectGuard;

    /** orchestrator 자신의 segment. deactivate/unload 대상에서 항상 제외 */
    bootstrapSegment: string;

    log?: TaggedLogger;
}

export interface LevelStateChange {
    level: Level;
    from: LevelState;
    to: LevelState;
}

const NO_RETAINED_SEGMENTS: ReadonlySet<string> = new Set();

function firstFault(handles: readonly SegmentHandle[]): ResourceFault | null {
    for (const handle of handles) {
        if (handle.error) return handle.error;
    }
    return null;
}

export class Level {
    readonly name: string;
    readonly segments: readonly string[];
    readonly primaryIndex: number;

    readonly onStateChangedObservable = new BABYLON.Observable<LevelStateChange>();

    private readonly context: LevelContext;
    private readonly log: TaggedLogger;

    private _state: LevelState = LevelState.NONE;

    /** 현재 전이의 segment 작업 */
    private _pending: SegmentHandle[] = [];

    /** LOADED 상태에서 finalize를 기다리는 load handle */
    private _staged: SegmentHandle[] = [];

    private _completion: Promise<TransitionResult> | null = null;
    private _foreground: string | null = null;

    constructor(definition: LevelDefinition, context: LevelContext) {
        this.name = definition.name;
        this.segments = Object.freeze([...definition.segments]);
        this.primaryIndex = definition.activeIndex;
        this.context = context;
        this.log = (context.log ?? new TaggedLogger('Level')).child(`Level:${definition.name}`);
    }

    get state(): LevelState {
        return this._state;
    }

    get pendingOperations(): readonly SegmentHandle[] {
        return this._pending;
    }

    /** ACTIVE 진입 시 선택된 foreground segment */
    get foregroundSegment(): string | null {
        return this._foreground;
    }

    /**
     * 마지막으로 시작된 전이의 completion signal
     */
    currentSignal(): Promise<TransitionResult> | null {
        return this._completion;
    }

    containsSegment(segmentId: string): boolean {
        return this.segments.includes(segmentId);
    }

    // ========================================
    // Load: NONE → LOADING → LOADED
    // ========================================

    load(): Promise<TransitionResult> {
        if (this._state === LevelState.LOADING && this._completion) {
            return this._completion;
        }
        if (!canBeginTransition('load', this._state)) {
            return this.rejectTransition('load');
        }

        const startTime = performance.now();
        this.setState(LevelState.LOADING);
        this._staged = [];
        this._pending = [];

        for (const segmentId of this.segments) {
            this._pending.push(this.context.loader.beginLoad(segmentId, false, this.name));
        }

        this._completion = this.runLoad(startTime);
        return this._completion;
    }

    private async runLoad(startTime: number): Promise<TransitionResult> {
        const handles = this._pending;
        await Promise.all(handles.map((handle) => handle.whenReady()));

        const fault = firstFault(handles);
        if (fault) {
            // 다른 레벨이 붙잡지 않은 staged segment는 버려서 재시도가 처음부터 로드하도록 한다
            for (const handle of handles) {
                handle.discard();
            }
            await Promise.all(handles.map((handle) => handle.whenDone()));
            for (const segmentId of this.segments) {
                this.context.loader.release(segmentId, this.name);
            }
            return this.fail('load', LevelState.NONE, fault, startTime);
        }

        this._staged = handles;
        this._pending = [];
        this.setState(LevelState.LOADED);
        return createCompletedResult(this.name, 'load', this._state, performance.now() - startTime);
    }

    // ========================================
    // Activate: LOADED → ACTIVATING → ACTIVE
    // ========================================

    activate(): Promise<TransitionResult> {
        if (this._state === LevelState.ACTIVATING && this._completion) {
            return this._completion;
        }
        if (!canBeginTransition('activate', this._state)) {
            return this.rejectTransition('activate');
        }

        const startTime = performance.now();
        this.setState(LevelState.ACTIVATING);
        this._pending = this._staged;
        this._staged = [];

        for (const handle of this._pending) {
            handle.allowFinalization();
        }

        this._completion = this.runActivate(startTime);
        return this._completion;
    }

    private async runActivate(startTime: number): Promise<TransitionResult> {
        const handles = this._pending;
        await Promise.all(handles.map((handle) => handle.whenDone()));

        const fault = firstFault(handles);
        if (fault) {
            return this.fail('activate', LevelState.LOADED, fault, startTime);
        }

        const missing = this.segments.find((segmentId) => !this.context.loader.isLoaded(segmentId));
        if (missing !== undefined) {
            const lost = new ResourceFault(missing, 'load', new Error('segment is not in the scene'));
            return this.fail('activate', LevelState.LOADED, lost, startTime);
        }

        this.selectForeground();
        this._pending = [];
        this.setState(LevelState.ACTIVE);
        return createCompletedResult(this.name, 'activate', this._state, performance.now() - startTime);
    }

    private selectForeground(): void {
        this._foreground = null;
        if (this.primaryIndex < 0) return;

        if (this.primaryIndex >= this.segments.length) {
            this.log.error(
                `Primary index ${this.primaryIndex} is out of range (${this.segments.length} segments), foreground left unset`
            );
            return;
        }

        // activate가 모든 segment의 scene 추가를 확인한 뒤에만 호출된다
        const segmentId = this.segments[this.primaryIndex];
        this.context.loader.setForegroundSegment(segmentId);
        this._foreground = segmentId;
    }

    // ========================================
    // Deactivate: ACTIVE → DEACTIVATED
    // ========================================

    /**
     * 레벨 segment의 root node를 dispose한다.
     * persistent container 소속 node, bootstrap segment, retainedSegments는 건드리지 않는다.
     */
    deactivate(retainedSegments: ReadonlySet<string> = NO_RETAINED_SEGMENTS): Promise<TransitionResult> {
        if (!canBeginTransition('deactivate', this._state)) {
            return this.rejectTransition('deactivate');
        }

        const { loader, guard, bootstrapSegment } = this.context;
        let disposed = 0;

        for (const segmentId of [...this.segments].reverse()) {
            if (segmentId === bootstrapSegment || retainedSegments.has(segmentId)) continue;
            if (!loader.isLoaded(segmentId)) continue;

            for (const node of guard.filterDestroyable(loader.getRootNodes(segmentId))) {
                node.dispose();
                disposed++;
            }
        }

        this.log.info(`Disposed ${disposed} root node(s)`);
        this._foreground = null;
        this.setState(LevelState.DEACTIVATED);
        this._completion = Promise.resolve(createCompletedResult(this.name, 'deactivate', this._state, 0));
        return this._completion;
    }

    // ========================================
    // Unload: DEACTIVATED | LOADED → UNLOADING → NONE
    // ========================================

    unload(retainedSegments: ReadonlySet<string> = NO_RETAINED_SEGMENTS): Promise<TransitionResult> {
        if (this._state === LevelState.UNLOADING && this._completion) {
            return this._completion;
        }
        if (!canBeginTransition('unload', this._state)) {
            return this.rejectTransition('unload');
        }

        const startTime = performance.now();
        const { loader, bootstrapSegment } = this.context;
        this.setState(LevelState.UNLOADING);

        // LOADED에서 내려가면 finalize되지 않은 load handle을 먼저 버린다
        for (const handle of this._staged) {
            handle.discard();
        }
        this._pending = this._staged;
        this._staged = [];

        for (const segmentId of this.segments) {
            if (segmentId === bootstrapSegment) {
                loader.release(segmentId, this.name);
                continue;
            }
            if (retainedSegments.has(segmentId)) {
                this.log.info(`Segment '${segmentId}' is retained, skipping unload`);
                loader.release(segmentId, this.name);
                continue;
            }
            this._pending.push(loader.beginUnload(segmentId, this.name));
        }

        this._completion = this.runUnload(startTime);
        return this._completion;
    }

    private async runUnload(startTime: number): Promise<TransitionResult> {
        const handles = this._pending;
        await Promise.all(handles.map((handle) => handle.whenDone()));

        const fault = firstFault(handles);
        if (fault) {
            // 일부 segment가 남아 있으므로 unload()로 재시도 가능한 상태로 둔다
            return this.fail('unload', LevelState.DEACTIVATED, fault, startTime);
        }

        this._pending = [];
        this.setState(LevelState.NONE);
        return createCompletedResult(this.name, 'unload', this._state, performance.now() - startTime);
    }

    // ----------------------------------------

    private fail(
        transition: LevelTransition,
        revertTo: LevelState,
        fault: ResourceFault,
        startTime: number
    ): TransitionResult {
        this.log.error(`${transition} failed: ${fault.message}`);
        this._pending = [];
        this.setState(revertTo);
        return createFailedResult(this.name, transition, this._state, fault, performance.now() - startTime);
    }

    private rejectTransition(transition: LevelTransition): Promise<TransitionResult> {
        const error = new StateConflictError(this.name, transition, this._state);
        this.log.warn(error.message);
        return Promise.resolve(createNoopResult(this.name, transition, this._state, error));
    }

    private setState(next: LevelState): void {
        const from = this._state;
        if (from === next) return;
        this._state = next;
        this.log.info(`${from} → ${next}`);
        this.onStateChangedObservable.notifyObservers({ level: this, from, to: next });
    }
}
