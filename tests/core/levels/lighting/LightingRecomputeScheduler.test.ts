import { describe, it, expect, vi } from 'vitest';
import * as BABYLON from '@babylonjs/core';
import { LightingRecomputeScheduler } from '@/core/levels/lighting/LightingRecomputeScheduler';
import type { LightingRecomputer } from '@/core/levels/lighting/LightingRecomputer';

interface Gate {
    blocked: boolean;
    readonly changes: BABYLON.Observable<void>;
}

function createGate(blocked: boolean): Gate {
    return { blocked, changes: new BABYLON.Observable<void>() };
}

function createScheduler(lighting: LightingRecomputer, gate: Gate): LightingRecomputeScheduler {
    return new LightingRecomputeScheduler(
        lighting,
        () => gate.blocked,
        (listener) => {
            const observer = gate.changes.add(() => listener());
            return () => gate.changes.remove(observer);
        }
    );
}

function createLighting(recompute: () => Promise<void>): LightingRecomputer {
    return { onRecomputeRequestedObservable: new BABYLON.Observable<void>(), recompute };
}

describe('LightingRecomputeScheduler', () => {
    it('recomputes once per request when nothing is activating', async () => {
        const recompute = vi.fn(async () => undefined);
        const scheduler = createScheduler(createLighting(recompute), createGate(false));

        scheduler.request();
        expect(scheduler.isRunning).toBe(true);
        await scheduler.whenIdle();

        expect(recompute).toHaveBeenCalledTimes(1);
        expect(scheduler.completedRuns).toBe(1);
        expect(scheduler.isRunning).toBe(false);
    });

    it('waits until the gate opens', async () => {
        const recompute = vi.fn(async () => undefined);
        const gate = createGate(true);
        const scheduler = createScheduler(createLighting(recompute), gate);

        scheduler.request();
        await new Promise((resolve) => setTimeout(resolve, 10));
        expect(recompute).not.toHaveBeenCalled();

        gate.changes.notifyObservers();
        expect(recompute).not.toHaveBeenCalled();

        gate.blocked = false;
        gate.changes.notifyObservers();
        await scheduler.whenIdle();

        expect(recompute).toHaveBeenCalledTimes(1);
    });

    it('coalesces requests made during a run into exactly one follow-up run', async () => {
        let finish: () => void = () => undefined;
        const recompute = vi.fn(
            () =>
                new Promise<void>((resolve) => {
                    finish = resolve;
                })
        );
        const scheduler = createScheduler(createLighting(recompute), createGate(false));

        scheduler.request();
        await vi.waitFor(() => expect(recompute).toHaveBeenCalledTimes(1));

        scheduler.request();
        scheduler.request();
        scheduler.request();
        finish();

        await vi.waitFor(() => expect(recompute).toHaveBeenCalledTimes(2));
        finish();
        await scheduler.whenIdle();

        expect(recompute).toHaveBeenCalledTimes(2);
        expect(scheduler.completedRuns).toBe(2);
    });

    it('logs a failed recompute and keeps accepting requests', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const failure = new Error('shader compile failed');
        const recompute = vi.fn().mockRejectedValueOnce(failure).mockResolvedValue(undefined);
        const scheduler = createScheduler(createLighting(recompute), createGate(false));

        scheduler.request();
        await scheduler.whenIdle();
        scheduler.request();
        await scheduler.whenIdle();

        expect(error).toHaveBeenCalledWith('[LightingRecompute] Lighting recompute failed', failure);
        expect(recompute).toHaveBeenCalledTimes(2);
        expect(scheduler.completedRuns).toBe(1);
    });

    it('abandons a waiting job when disposed', async () => {
        const recompute = vi.fn(async () => undefined);
        const scheduler = createScheduler(createLighting(recompute), createGate(true));

        scheduler.request();
        scheduler.dispose();
        await scheduler.whenIdle();
        scheduler.request();

        expect(recompute).not.toHaveBeenCalled();
        expect(scheduler.isRunning).toBe(false);
    });
});
