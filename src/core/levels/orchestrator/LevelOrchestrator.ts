/**
 * LevelOrchestrator - 여러 레벨의 lifecycle을 순서대로 조정한다.
 *
 * Combines:
 * - LevelRegistry (이름 → Level)
 * - SegmentLoader (segment load/unload primitive)
 * - PersistentObjectGuard (teardown에서 제외되는 node)
 * - LightingRecomputeScheduler (조명 재계산 job, 선택)
 *
 * Key Responsibilities:
 * - tracked set 관리: "load 시작 ~ unload 완료" 사이의 레벨
 * - activateAndUnloadOthers: 대상 레벨을 ACTIVE로 만들고 나머지를 정리
 * - ACTIVE 레벨은 어떤 상태 변화 시점에도 최대 1개
 *
 * 공개 메서드는 throw하지 않는다. 모든 실패는 LevelRequestResult와 로그로 전달된다.
 */

import * as BABYLON from '@babylonjs/core';
import { DEFAULT_LEVEL_LOADER_CONFIG, type LevelLoaderConfig } from '../../../shared/config/LevelLoaderConfig';
import { TaggedLogger } from '../../../shared/logging/TaggedLogger';
import {
    ConfigurationError,
    InvariantViolation,
    LevelLoaderError,
    StateConflictError,
    toError,
} from '../errors/LevelErrors';
import type { PersistentObjectGuard } from '../guard/PersistentObjectGuard';
import type { Level, LevelStateChange } from '../level/Level';
import type { LightingRecomputer } from '../lighting/LightingRecomputer';
import { LightingRecomputeScheduler } from '../lighting/LightingRecomputeScheduler';
import { LevelState, isInFlightState } from '../protocol/LevelState';
import { createRequestResult, type LevelRequest, type LevelRequestResult } from '../protocol/TransitionResult';
import type { LevelRegistry } from '../registry/LevelRegistry';
import type { SegmentLoader } from '../segment/SegmentLoader';

/**
 * Orchestrator callbacks
 */
export interface LevelOrchestratorCallbacks {
    /** 모든 로그 라인 */
    onLog?: (line: string) => void;

    /** 실패한 요청, 정리 중 발생한 fault */
    onError?: (error: LevelLoaderError) => void;
}

export interface LevelOrchestratorDeps {
    scene: BABYLON.Scene;
    registry: LevelRegistry;
    loader: SegmentLoader;
    guard: PersistentObjectGuard;

    /** 없으면 조명 재계산을 하지 않는다 */
    lighting?: LightingRecomputer;

    config?: LevelLoaderConfig;
    callbacks?: LevelOrchestratorCallbacks;

    /** 없으면 config.verbose / callbacks.onLog로 생성 */
    log?: TaggedLogger;
}

export class LevelOrchestrator {
    /** 살아있는 인스턴스 (동시에 하나만 허용) */
    private static live: LevelOrchestrator | null = null;

    /** tracked 레벨의 모든 상태 변화 */
    readonly onLevelStateChangedObservable = new BABYLON.Observable<LevelStateChange>();

    private readonly scene: BABYLON.Scene;
    private readonly registry: LevelRegistry;
    private readonly loader: SegmentLoader;
    private readonly guard: PersistentObjectGuard;
    private readonly config: LevelLoaderConfig;
    private readonly callbacks: LevelOrchestratorCallbacks;
    private readonly log: TaggedLogger;

    private readonly lighting: LightingRecomputer | null;
    private readonly lightingScheduler: LightingRecomputeScheduler | null;
    private lightingObserver: BABYLON.Nullable<BABYLON.Observer<void>> = null;

    private readonly levelObservers: Array<{
        level: Level;
        observer: BABYLON.Nullable<BABYLON.Observer<LevelStateChange>>;
    }> = [];

    /** load 시작 순서 */
    private tracked: Level[] = [];

    private readonly inFlight = new Map<string, Promise<LevelRequestResult>>();
    private sequence: Promise<void> = Promise.resolve();
    private disposed = false;

    /**
     * @throws InvariantViolation 이미 살아있는 orchestrator가 있을 때
     */
    constructor(deps: LevelOrchestratorDeps) {
        if (LevelOrchestrator.live) {
            throw new InvariantViolation('A LevelOrchestrator is already live; dispose it before creating another');
        }

        this.scene = deps.scene;
        this.registry = deps.registry;
        this.loader = deps.loader;
        this.guard = deps.guard;
        this.config = deps.config ?? { ...DEFAULT_LEVEL_LOADER_CONFIG };
        this.callbacks = deps.callbacks ?? {};
        this.log =
            deps.log ??
            new TaggedLogger('LevelOrchestrator', { verbose: this.config.verbose, onLog: this.callbacks.onLog });

        for (const level of this.registry.getAll()) {
            const observer = level.onStateChangedObservable.add((change) => {
                this.onLevelStateChangedObservable.notifyObservers(change);
            });
            this.levelObservers.push({ level, observer });
        }

        this.lighting = deps.lighting ?? null;
        this.lightingScheduler = null;
        if (this.lighting) {
            const scheduler = new LightingRecomputeScheduler(
                this.lighting,
                () => this.tracked.some((level) => level.state === LevelState.ACTIVATING),
                (listener) => {
                    const observer = this.onLevelStateChangedObservable.add(() => listener());
                    return () => this.onLevelStateChangedObservable.remove(observer);
                },
                this.log.child('LightingRecompute')
            );
            this.lightingObserver = this.lighting.onRecomputeRequestedObservable.add(() => scheduler.request());
            this.lightingScheduler = scheduler;
        }

        LevelOrchestrator.live = this;
    }

    // ========================================
    // Accessors
    // ========================================

    getScene(): BABYLON.Scene {
        return this.scene;
    }

    getLoader(): SegmentLoader {
        return this.loader;
    }

    getGuard(): PersistentObjectGuard {
        return this.guard;
    }

    getConfig(): Readonly<LevelLoaderConfig> {
        return this.config;
    }

    getLightingScheduler(): LightingRecomputeScheduler | null {
        return this.lightingScheduler;
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    /** tracked set snapshot (load 시작 순서) */
    getTrackedLevels(): ReadonlyArray<Level> {
        return [...this.tracked];
    }

    isTracked(nameOrLevel: string | Level): boolean {
        return this.tracked.some((level) =>
            typeof nameOrLevel === 'string' ? level.name === nameOrLevel : level === nameOrLevel
        );
    }

    getActiveLevel(): Level | null {
        return this.tracked.find((level) => level.state === LevelState.ACTIVE) ?? null;
    }

    getForegroundSegment(): string | null {
        return this.loader.getForegroundSegment();
    }

    /**
     * 이름으로 레벨 조회. 없으면 ConfigurationError를 로그로 남기고 null.
     */
    getLevel(name: string): Level | null {
        const level = this.registry.get(name);
        if (!level) {
            this.log.error(this.unknownLevel(name).message);
            return null;
        }
        return level;
    }

    findLevel(predicate: (level: Level) => boolean): Level | null {
        const level = this.registry.find(predicate);
        if (!level) {
            this.log.warn('No level matches the given predicate');
            return null;
        }
        return level;
    }

    // ========================================
    // Public API
    // ========================================

    /**
     * 레벨 로드를 시작한다. activateOnLoad면 로드 후 activateAndUnloadOthers로 이어진다.
     */
    loadLevel(name: string, activateOnLoad: boolean = false): Promise<LevelRequestResult> {
        return this.guardCall('loadLevel', name, () => this.runLoadLevel(name, activateOnLoad));
    }

    /**
     * 대상 레벨을 ACTIVE로 만들고 나머지 tracked 레벨을 정리한다.
     * 같은 대상에 대한 중복 호출은 진행 중인 Promise를 반환한다.
     */
    activateAndUnloadOthers(name: string): Promise<LevelRequestResult> {
        const pending = this.inFlight.get(name);
        if (pending) {
            this.log.info(`activateAndUnloadOthers('${name}') already in flight, joining it`);
            return pending;
        }

        const request = this.guardCall('activateAndUnloadOthers', name, () =>
            this.runExclusive(() => this.runActivateAndUnloadOthers(name))
        );
        this.inFlight.set(name, request);
        void request.then(() => {
            if (this.inFlight.get(name) === request) {
                this.inFlight.delete(name);
            }
        });
        return request;
    }

    /**
     * 모든 tracked 레벨을 unload한다.
     */
    unloadAll(): Promise<LevelRequestResult> {
        return this.guardCall('unloadAll', null, () => this.runExclusive(() => this.runUnloadAll()));
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;

        this.lightingScheduler?.dispose();
        if (this.lighting) {
            this.lighting.onRecomputeRequestedObservable.remove(this.lightingObserver);
            this.lightingObserver = null;
        }

        for (const { level, observer } of this.levelObservers) {
            level.onStateChangedObservable.remove(observer);
        }
        this.levelObservers.length = 0;
        this.onLevelStateChangedObservable.clear();
        this.inFlight.clear();

        if (LevelOrchestrator.live === this) {
            LevelOrchestrator.live = null;
        }
        this.log.info('Disposed');
    }

    // ========================================
    // loadLevel
    // ========================================

    private async runLoadLevel(name: string, activateOnLoad: boolean): Promise<LevelRequestResult> {
        const level = this.registry.get(name);
        if (!level) {
            return this.reportFailure('loadLevel', name, this.unknownLevel(name));
        }

        if (this.isTracked(level) || level.state !== LevelState.NONE) {
            if (activateOnLoad && level.state === LevelState.LOADED) {
                return this.relabel('loadLevel', await this.activateAndUnloadOthers(name));
            }
            const conflict = new StateConflictError(name, 'load', level.state);
            this.log.warn(`Level '${name}' is already tracked (${level.state}), skipping load`);
            return createRequestResult('loadLevel', name, 'noop', conflict);
        }

        this.track(level);
        const result = await level.load();

        if (result.outcome !== 'completed') {
            if (level.state === LevelState.NONE) {
                this.untrack(level);
            }
            return this.toRequestFailure('loadLevel', name, result.error);
        }

        if (activateOnLoad) {
            return this.relabel('loadLevel', await this.activateAndUnloadOthers(name));
        }
        return createRequestResult('loadLevel', name, 'completed');
    }

    // ========================================
    // activateAndUnloadOthers
    // ========================================

    private async runActivateAndUnloadOthers(name: string): Promise<LevelRequestResult> {
        const request: LevelRequest = 'activateAndUnloadOthers';

        // 1. resolve
        const target = this.registry.get(name);
        if (!target) {
            return this.reportFailure(request, name, this.unknownLevel(name));
        }

        // 2. 이미 ACTIVE
        if (target.state === LevelState.ACTIVE) {
            this.log.info(`Level '${name}' is already active`);
            return createRequestResult(request, name, 'noop');
        }

        // 3. 진행 중인 load/activate는 다시 요청하지 않고 기다린다
        if (target.state === LevelState.LOADING || target.state === LevelState.ACTIVATING) {
            const signal = target.currentSignal();
            if (signal) {
                const awaited = await signal;
                if (awaited.outcome === 'failed') {
                    return this.toRequestFailure(request, name, awaited.error);
                }
            }
        }

        // 4. NONE이면 처음부터 로드
        if (target.state === LevelState.NONE) {
            this.track(target);
            const loaded = await target.load();
            if (loaded.outcome !== 'completed') {
                if (target.state === LevelState.NONE) {
                    this.untrack(target);
                }
                return this.toRequestFailure(request, name, loaded.error);
            }
        }

        if (target.state !== LevelState.LOADED && target.state !== LevelState.ACTIVE) {
            const conflict = new StateConflictError(name, request, target.state);
            this.log.warn(conflict.message);
            return createRequestResult(request, name, 'noop', conflict);
        }
        this.track(target);

        // 5. 나머지 레벨 deactivate (역순). 대상과 공유하는 segment는 남긴다.
        const retained: ReadonlySet<string> = new Set(target.segments);
        const others = this.tracked.filter((level) => level !== target).reverse();

        for (const other of others) {
            await this.settle(other);
        }
        for (const other of others) {
            if (other.state === LevelState.ACTIVE) {
                await other.deactivate(retained);
            }
        }
        // LOADED 레벨은 staged segment를 finalize한 뒤 내린다 (공유 segment가 scene에 들어가도록)
        for (const other of others) {
            if (other.state !== LevelState.LOADED) continue;
            const activated = await other.activate();
            if (activated.outcome === 'completed') {
                await other.deactivate(retained);
            } else if (activated.error) {
                this.reportError(activated.error);
            }
        }

        // 6. 대상 activate
        if (target.state === LevelState.LOADED) {
            const activated = await target.activate();
            if (activated.outcome !== 'completed') {
                return this.toRequestFailure(request, name, activated.error);
            }
        }
        if (target.state !== LevelState.ACTIVE) {
            const conflict = new StateConflictError(name, request, target.state);
            this.log.warn(conflict.message);
            return createRequestResult(request, name, 'noop', conflict);
        }

        // 7. 나머지 레벨 unload, NONE이 되면 tracked에서 제거
        for (const other of others) {
            await this.settle(other);
            if (other.state === LevelState.DEACTIVATED || other.state === LevelState.LOADED) {
                const unloaded = await other.unload(retained);
                if (unloaded.outcome === 'failed' && unloaded.error) {
                    this.reportError(unloaded.error);
                }
            }
            if (other.state === LevelState.NONE) {
                this.untrack(other);
            }
        }

        // 8. bootstrap segment 정리
        await this.unloadBootstrapUnlessUsedBy(target);

        this.log.info(`Level '${name}' is now active (tracked: ${this.tracked.map((l) => l.name).join(', ')})`);
        return createRequestResult(request, name, 'completed');
    }

    private async unloadBootstrapUnlessUsedBy(target: Level): Promise<void> {
        const bootstrap = this.config.bootstrapSegment;
        if (target.containsSegment(bootstrap) || !this.loader.isPresent(bootstrap)) return;

        const handle = this.loader.beginUnload(bootstrap);
        await handle.whenDone();
        if (handle.error) {
            this.reportError(handle.error);
        }
    }

    // ========================================
    // unloadAll
    // ========================================

    private async runUnloadAll(): Promise<LevelRequestResult> {
        let firstError: LevelLoaderError | undefined;

        for (const level of [...this.tracked].reverse()) {
            await this.settle(level);

            if (level.state === LevelState.ACTIVE) {
                await level.deactivate();
            }
            if (level.state === LevelState.DEACTIVATED || level.state === LevelState.LOADED) {
                const unloaded = await level.unload();
                if (unloaded.outcome === 'failed' && unloaded.error) {
                    this.reportError(unloaded.error);
                    firstError ??= unloaded.error;
                }
            }
        }

        // unload에 실패한 레벨만 남는다
        this.tracked = this.tracked.filter((level) => level.state !== LevelState.NONE);

        if (firstError) {
            return createRequestResult('unloadAll', null, 'failed', firstError);
        }
        this.log.info('All levels unloaded');
        return createRequestResult('unloadAll', null, 'completed');
    }

    // ========================================
    // Internals
    // ========================================

    private track(level: Level): void {
        if (this.tracked.includes(level)) return;
        this.tracked.push(level);
    }

    private untrack(level: Level): void {
        this.tracked = this.tracked.filter((tracked) => tracked !== level);
    }

    /**
     * 진행 중인 전이가 끝날 때까지 대기
     */
    private async settle(level: Level): Promise<void> {
        while (isInFlightState(level.state)) {
            const signal = level.currentSignal();
            if (!signal) return;
            await signal;
        }
    }

    /**
     * 순서가 필요한 요청을 하나씩 실행한다
     */
    private runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.sequence.then(task);
        // 실패는 run을 통해 호출자에게 전달된다. 다음 작업은 계속 진행한다.
        this.sequence = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    private async guardCall(
        request: LevelRequest,
        levelName: string | null,
        body: () => Promise<LevelRequestResult>
    ): Promise<LevelRequestResult> {
        if (this.disposed) {
            return this.reportFailure(
                request,
                levelName,
                new InvariantViolation(`${request} called on a disposed LevelOrchestrator`)
            );
        }

        try {
            return await body();
        } catch (err) {
            const error =
                err instanceof LevelLoaderError
                    ? err
                    : new InvariantViolation(`${request} failed unexpectedly: ${toError(err).message}`);
            return this.reportFailure(request, levelName, error);
        }
    }

    private unknownLevel(name: string): ConfigurationError {
        return new ConfigurationError(`Level '${name}' is not defined in the registry`, name);
    }

    private relabel(request: LevelRequest, result: LevelRequestResult): LevelRequestResult {
        return createRequestResult(request, result.levelName, result.outcome, result.error);
    }

    /**
     * Level이 이미 로그를 남긴 실패를 요청 결과로 바꾼다
     */
    private toRequestFailure(
        request: LevelRequest,
        levelName: string,
        error: LevelLoaderError | undefined
    ): LevelRequestResult {
        if (error) {
            this.callbacks.onError?.(error);
        }
        return createRequestResult(request, levelName, 'failed', error);
    }

    private reportFailure(request: LevelRequest, levelName: string | null, error: LevelLoaderError): LevelRequestResult {
        this.reportError(error);
        return createRequestResult(request, levelName, 'failed', error);
    }

    private reportError(error: LevelLoaderError): void {
        this.log.error(error.message);
        this.callbacks.onError?.(error);
    }
}
