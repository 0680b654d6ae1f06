/**
 * createLevelRuntime - 레벨 로더 composition root.
 *
 * 흐름: Engine → Scene → PersistentObjectGuard → SegmentLoader → LevelRegistry
 *       → SceneLightingRecomputer → LevelOrchestrator
 *
 * 핵심 원칙:
 * - orchestrator는 여기서 한 번 만들어 호출자에게 넘긴다 (전역 Instance 없음)
 * - 모든 컴포넌트는 같은 TaggedLogger 설정(verbose, onLog)을 공유한다
 * - engine을 넘기지 않으면 headless NullEngine을 사용한다
 */

import * as BABYLON from '@babylonjs/core';
import { LevelOrchestrator, type LevelOrchestratorCallbacks } from '../core/levels/orchestrator/LevelOrchestrator';
import { PersistentObjectGuard } from '../core/levels/guard/PersistentObjectGuard';
import { SceneLightingRecomputer } from '../core/levels/lighting/LightingRecomputer';
import type { LevelDefinition } from '../core/levels/registry/LevelDefinition';
import { LevelRegistry } from '../core/levels/registry/LevelRegistry';
import { SegmentLoader } from '../core/levels/segment/SegmentLoader';
import type { SegmentSourceMap } from '../core/levels/segment/SegmentSource';
import { resolveLevelLoaderConfig, type LevelLoaderConfig } from '../shared/config/LevelLoaderConfig';
import { TaggedLogger } from '../shared/logging/TaggedLogger';

export interface LevelRuntimeOptions {
    definitions: readonly LevelDefinition[];
    sources: SegmentSourceMap;

    /** env / 기본값 위에 덮어쓸 설정 */
    config?: Partial<LevelLoaderConfig>;

    /** 기본: new NullEngine() (dispose 시 함께 정리) */
    engine?: BABYLON.AbstractEngine;

    callbacks?: LevelOrchestratorCallbacks;

    /** 조명 재계산 비활성화 */
    disableLighting?: boolean;
}

export interface LevelRuntime {
    readonly engine: BABYLON.AbstractEngine;
    readonly scene: BABYLON.Scene;
    readonly guard: PersistentObjectGuard;
    readonly loader: SegmentLoader;
    readonly registry: LevelRegistry;
    readonly lighting: SceneLightingRecomputer | null;
    readonly orchestrator: LevelOrchestrator;
    readonly config: LevelLoaderConfig;
    dispose(): void;
}

/**
 * @throws ConfigurationError 레벨 이름 중복
 * @throws InvariantViolation 이미 살아있는 orchestrator가 있을 때
 */
export function createLevelRuntime(options: LevelRuntimeOptions): LevelRuntime {
    const config = resolveLevelLoaderConfig(options.config);
    const rootLog = new TaggedLogger('LevelRuntime', {
        verbose: config.verbose,
        onLog: options.callbacks?.onLog,
    });

    const ownsEngine = options.engine === undefined;
    const engine = options.engine ?? new BABYLON.NullEngine();
    const scene = new BABYLON.Scene(engine);

    const guard = new PersistentObjectGuard(scene, config.persistentContainerName, rootLog.child('PersistentObjectGuard'));
    const loader = new SegmentLoader(scene, guard, {
        sources: options.sources,
        log: rootLog.child('SegmentLoader'),
    });

    let registry: LevelRegistry;
    let lighting: SceneLightingRecomputer | null = null;
    let orchestrator: LevelOrchestrator;
    try {
        registry = new LevelRegistry(options.definitions, {
            loader,
            guard,
            bootstrapSegment: config.bootstrapSegment,
            log: rootLog,
        });
        lighting = options.disableLighting ? null : new SceneLightingRecomputer(scene);
        orchestrator = new LevelOrchestrator({
            scene,
            registry,
            loader,
            guard,
            lighting: lighting ?? undefined,
            config,
            callbacks: options.callbacks,
            log: rootLog.child('LevelOrchestrator'),
        });
    } catch (err) {
        lighting?.dispose();
        scene.dispose();
        if (ownsEngine) engine.dispose();
        throw err;
    }

    rootLog.info(`Runtime ready (${registry.size} levels, bootstrap '${config.bootstrapSegment}')`);

    let disposed = false;
    return {
        engine,
        scene,
        guard,
        loader,
        registry,
        lighting,
        orchestrator,
        config,
        dispose(): void {
            if (disposed) return;
            disposed = true;
            orchestrator.dispose();
            lighting?.dispose();
            loader.dispose();
            guard.dispose();
            scene.dispose();
            if (ownsEngine) engine.dispose();
            rootLog.info('Runtime disposed');
        },
    };
}
