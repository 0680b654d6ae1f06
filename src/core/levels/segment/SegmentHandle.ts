/**
 * SegmentHandle - segment load/unload 작업 하나의 진행 상태.
 *
 * Load handle의 흐름:
 *   fetch (progress 0 → 0.9) → readyToFinalize → [allowFinalization()] → scene 추가 → done
 *
 * - 0.9 (FINALIZE_THRESHOLD)에서 멈춘 뒤 finalize 허가를 기다린다.
 * - Unload handle은 생성 시점부터 finalize가 허가되어 있다.
 * - whenReady()/whenDone()은 실패해도 resolve된다. 실패 여부는 error로 확인한다.
 */

import * as BABYLON from '@babylonjs/core';
import { createDeferred } from '../../../shared/async/Deferred';
import type { ResourceFault, SegmentOperationKind } from '../errors/LevelErrors';

/** fetch 완료 시점의 progress */
export const FINALIZE_THRESHOLD = 0.9;

export class SegmentHandle {
    readonly segmentId: string;
    readonly kind: SegmentOperationKind;

    /** progress 변경 알림 (0~1) */
    readonly onProgressObservable = new BABYLON.Observable<number>();

    private _progress = 0;
    private _readyToFinalize = false;
    private _finalizationAllowed = false;
    private _discarded = false;
    private _done = false;
    private _error: ResourceFault | null = null;

    private readonly ready = createDeferred<void>();
    private readonly done = createDeferred<void>();
    private readonly finalizeGate = createDeferred<boolean>();

    constructor(segmentId: string, kind: SegmentOperationKind, allowFinalization: boolean = false) {
        this.segmentId = segmentId;
        this.kind = kind;
        if (allowFinalization) {
            this.allowFinalization();
        }
    }

    get progress(): number {
        return this._progress;
    }

    get isReadyToFinalize(): boolean {
        return this._readyToFinalize && this._error === null;
    }

    get finalizationAllowed(): boolean {
        return this._finalizationAllowed;
    }

    get isDiscarded(): boolean {
        return this._discarded;
    }

    get isDone(): boolean {
        return this._done;
    }

    get error(): ResourceFault | null {
        return this._error;
    }

    /**
     * finalize 허가 (scene activation)
     */
    allowFinalization(): void {
        this._finalizationAllowed = true;
        this.finalizeGate.resolve(true);
    }

    /**
     * finalize하지 않고 버린다. 이미 허가된 handle에는 효과 없음.
     */
    discard(): void {
        if (this._finalizationAllowed) return;
        this._discarded = true;
        this.finalizeGate.resolve(false);
    }

    /** fetch 완료, 실패, 또는 완료 시 resolve */
    whenReady(): Promise<void> {
        return this.ready.promise;
    }

    /** 완료 또는 실패 시 resolve */
    whenDone(): Promise<void> {
        return this.done.promise;
    }

    // ----------------------------------------
    // SegmentLoader 전용
    // ----------------------------------------

    /** @internal finalize 허가(true) 또는 discard(false)까지 대기 */
    waitForFinalization(): Promise<boolean> {
        return this.finalizeGate.promise;
    }

    /** @internal */
    reportProgress(progress: number): void {
        if (this._done) return;
        const next = Math.max(this._progress, Math.min(FINALIZE_THRESHOLD, progress));
        if (next === this._progress) return;
        this._progress = next;
        this.onProgressObservable.notifyObservers(next);
    }

    /** @internal */
    markReadyToFinalize(): void {
        this.reportProgress(FINALIZE_THRESHOLD);
        this._readyToFinalize = true;
        this.ready.resolve();
    }

    /** @internal */
    complete(): void {
        if (this._done) return;
        this._readyToFinalize = true;
        this._done = true;
        this._progress = 1;
        this.onProgressObservable.notifyObservers(1);
        this.ready.resolve();
        this.done.resolve();
    }

    /** @internal */
    fail(error: ResourceFault): void {
        if (this._done) return;
        this._error = error;
        this._done = true;
        this.ready.resolve();
        this.done.resolve();
    }
}
