import { describe, it, expect, vi } from 'vitest';
import { TaggedLogger } from '@/shared/logging/TaggedLogger';

describe('TaggedLogger', () => {
    it('prefixes lines with the tag', () => {
        expect(new TaggedLogger('SegmentLoader').format('ready')).toBe('[SegmentLoader] ready');
    });

    it('prints info only when verbose', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        new TaggedLogger('Quiet').info('hidden');
        new TaggedLogger('Loud', { verbose: true }).info('shown');

        expect(log).toHaveBeenCalledTimes(1);
        expect(log).toHaveBeenCalledWith('[Loud] shown');
    });

    it('always prints warnings and errors with their details', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const cause = new Error('boom');
        const logger = new TaggedLogger('Level:A');

        logger.warn('slow segment');
        logger.error('failed', cause);

        expect(warn).toHaveBeenCalledWith('[Level:A] slow segment');
        expect(error).toHaveBeenCalledWith('[Level:A] failed', cause);
    });

    it('forwards every line to onLog, including from child loggers', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const lines: string[] = [];
        const parent = new TaggedLogger('LevelRuntime', { onLog: (line) => lines.push(line) });

        parent.info('starting');
        parent.child('SegmentLoader').warn('replaced');

        expect(lines).toEqual(['[LevelRuntime] starting', '[SegmentLoader] replaced']);
    });
});
