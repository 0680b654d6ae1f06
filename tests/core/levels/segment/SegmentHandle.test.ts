import { describe, it, expect, vi } from 'vitest';
import { FINALIZE_THRESHOLD, SegmentHandle } from '@/core/levels/segment/SegmentHandle';
import { ResourceFault } from '@/core/levels/errors/LevelErrors';

describe('SegmentHandle', () => {
    it('clamps reported progress below the finalize threshold', () => {
        const handle = new SegmentHandle('s1', 'load');

        handle.reportProgress(0.5);
        handle.reportProgress(1);

        expect(handle.progress).toBe(FINALIZE_THRESHOLD);
        expect(handle.isDone).toBe(false);
    });

    it('never moves progress backwards', () => {
        const handle = new SegmentHandle('s1', 'load');
        const listener = vi.fn();
        handle.onProgressObservable.add(listener);

        handle.reportProgress(0.6);
        handle.reportProgress(0.3);

        expect(handle.progress).toBe(0.6);
        expect(listener).toHaveBeenCalledTimes(1);
    });

    it('waits for finalization until allowed', async () => {
        const handle = new SegmentHandle('s1', 'load');
        handle.markReadyToFinalize();

        expect(handle.isReadyToFinalize).toBe(true);
        expect(handle.finalizationAllowed).toBe(false);

        handle.allowFinalization();
        await expect(handle.waitForFinalization()).resolves.toBe(true);
    });

    it('resolves the finalization gate with false when discarded', async () => {
        const handle = new SegmentHandle('s1', 'load');
        handle.discard();

        expect(handle.isDiscarded).toBe(true);
        await expect(handle.waitForFinalization()).resolves.toBe(false);
    });

    it('ignores discard once finalization is allowed', () => {
        const handle = new SegmentHandle('s1', 'load', true);
        handle.discard();

        expect(handle.isDiscarded).toBe(false);
    });

    it('resolves whenReady and whenDone on failure and records the fault', async () => {
        const handle = new SegmentHandle('s1', 'load');
        const fault = new ResourceFault('s1', 'load', new Error('timeout'));

        handle.fail(fault);
        await handle.whenReady();
        await handle.whenDone();

        expect(handle.error).toBe(fault);
        expect(handle.isReadyToFinalize).toBe(false);
        expect(fault.message).toBe("Segment 's1' failed to load: timeout");
    });

    it('reports full progress on completion', async () => {
        const handle = new SegmentHandle('s1', 'unload', true);

        handle.complete();
        await handle.whenDone();

        expect(handle.progress).toBe(1);
        expect(handle.isDone).toBe(true);
    });
});
