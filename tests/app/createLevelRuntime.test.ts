import { describe, it, expect, afterEach, vi } from 'vitest';
import * as BABYLON from '@babylonjs/core';
import { createLevelRuntime, type LevelRuntime } from '@/app/createLevelRuntime';
import { ConfigurationError } from '@/core/levels/errors/LevelErrors';
import { level, nodeSegments } from '../helpers/levelTestbed';

describe('createLevelRuntime', () => {
    let runtime: LevelRuntime | null = null;

    afterEach(() => {
        runtime?.dispose();
        runtime = null;
    });

    it('wires a headless scene, guard and orchestrator', () => {
        const rt = createLevelRuntime({
            definitions: [level('A', ['s1'])],
            sources: nodeSegments('s1'),
            config: { persistentContainerName: 'Keep', verbose: false },
        });
        runtime = rt;

        expect(rt.engine).toBeInstanceOf(BABYLON.NullEngine);
        expect(rt.scene.getEngine()).toBe(rt.engine);
        expect(rt.guard.root.name).toBe('Keep');
        expect(rt.registry.has('A')).toBe(true);
        expect(rt.loader.hasSource('s1')).toBe(true);
        expect(rt.lighting).not.toBe(null);
        expect(rt.orchestrator.getScene()).toBe(rt.scene);
        expect(rt.orchestrator.getLightingScheduler()).not.toBe(null);
    });

    it('can run without lighting recomputation', () => {
        const rt = createLevelRuntime({
            definitions: [level('A', ['s1'])],
            sources: nodeSegments('s1'),
            disableLighting: true,
        });
        runtime = rt;

        expect(rt.lighting).toBe(null);
        expect(rt.orchestrator.getLightingScheduler()).toBe(null);
    });

    it('forwards log lines to onLog', () => {
        const lines: string[] = [];
        runtime = createLevelRuntime({
            definitions: [level('A', ['s1'])],
            sources: nodeSegments('s1'),
            config: { verbose: false },
            callbacks: { onLog: (line) => lines.push(line) },
        });

        expect(lines).toContain("[LevelRuntime] Runtime ready (1 levels, bootstrap 'bootstrap')");
    });

    it('throws on duplicate level names and leaves no live orchestrator behind', () => {
        expect(() =>
            createLevelRuntime({
                definitions: [level('A', ['s1']), level('A', ['s2'])],
                sources: nodeSegments('s1', 's2'),
            })
        ).toThrow(ConfigurationError);

        runtime = createLevelRuntime({ definitions: [level('A', ['s1'])], sources: nodeSegments('s1') });
        expect(runtime.orchestrator.isDisposed).toBe(false);
    });

    it('disposes everything it created', async () => {
        const rt = createLevelRuntime({ definitions: [level('A', ['s1'])], sources: nodeSegments('s1') });
        await rt.orchestrator.loadLevel('A', true);

        rt.dispose();

        expect(rt.scene.isDisposed).toBe(true);
        expect(rt.orchestrator.isDisposed).toBe(true);
        expect(rt.loader.getPresentSegments()).toEqual([]);
    });

    it('leaves a caller-provided engine alive', () => {
        const engine = new BABYLON.NullEngine();
        const dispose = vi.spyOn(engine, 'dispose');
        const rt = createLevelRuntime({ definitions: [], sources: {}, engine });

        rt.dispose();

        expect(dispose).not.toHaveBeenCalled();
        engine.dispose();
    });
});
