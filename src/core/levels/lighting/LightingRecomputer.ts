/**
 * LightingRecomputer - 조명 재계산을 요청하고 수행하는 환경 쪽 collaborator.
 *
 * orchestrator는 요청을 구독하고, 실행 시점만 결정한다 (LightingRecomputeScheduler).
 */

import * as BABYLON from '@babylonjs/core';

export interface LightingRecomputer {
    /** 환경이 재계산을 원할 때 notify */
    readonly onRecomputeRequestedObservable: BABYLON.Observable<void>;

    recompute(): Promise<void>;
}

/**
 * Scene의 light 추가/제거를 감지해 재계산을 요청한다.
 * 재계산 = 모든 material의 light dirty flag 설정 후 scene ready 대기.
 */
export class SceneLightingRecomputer implements LightingRecomputer {
    readonly onRecomputeRequestedObservable = new BABYLON.Observable<void>();

    private readonly scene: BABYLON.Scene;
    private lightAddedObserver: BABYLON.Nullable<BABYLON.Observer<BABYLON.Light>>;
    private lightRemovedObserver: BABYLON.Nullable<BABYLON.Observer<BABYLON.Light>>;
    private _recomputeCount = 0;

    constructor(scene: BABYLON.Scene) {
        this.scene = scene;
        this.lightAddedObserver = scene.onNewLightAddedObservable.add(() => this.requestRecompute());
        this.lightRemovedObserver = scene.onLightRemovedObservable.add(() => this.requestRecompute());
    }

    /** 완료된 재계산 횟수 */
    get recomputeCount(): number {
        return this._recomputeCount;
    }

    requestRecompute(): void {
        this.onRecomputeRequestedObservable.notifyObservers();
    }

    async recompute(): Promise<void> {
        this.scene.markAllMaterialsAsDirty(BABYLON.Constants.MATERIAL_LightDirtyFlag);
        await this.scene.whenReadyAsync();
        this._recomputeCount++;
    }

    dispose(): void {
        this.scene.onNewLightAddedObservable.remove(this.lightAddedObserver);
        this.scene.onLightRemovedObservable.remove(this.lightRemovedObserver);
        this.lightAddedObserver = null;
        this.lightRemovedObserver = null;
        this.onRecomputeRequestedObservable.clear();
    }
}
