import { describe, it, expect } from 'vitest';
import {
    LevelState,
    TRANSITION_TABLE,
    canBeginTransition,
    inFlightTransition,
    isInFlightState,
} from '@/core/levels/protocol/LevelState';

describe('LevelState', () => {
    describe('canBeginTransition', () => {
        it('allows load only from NONE', () => {
            expect(canBeginTransition('load', LevelState.NONE)).toBe(true);
            expect(canBeginTransition('load', LevelState.LOADED)).toBe(false);
            expect(canBeginTransition('load', LevelState.DEACTIVATED)).toBe(false);
        });

        it('allows activate only from LOADED', () => {
            expect(canBeginTransition('activate', LevelState.LOADED)).toBe(true);
            expect(canBeginTransition('activate', LevelState.NONE)).toBe(false);
            expect(canBeginTransition('activate', LevelState.ACTIVE)).toBe(false);
        });

        it('allows deactivate only from ACTIVE', () => {
            expect(canBeginTransition('deactivate', LevelState.ACTIVE)).toBe(true);
            expect(canBeginTransition('deactivate', LevelState.LOADED)).toBe(false);
        });

        it('allows unload from DEACTIVATED and LOADED', () => {
            expect(canBeginTransition('unload', LevelState.DEACTIVATED)).toBe(true);
            expect(canBeginTransition('unload', LevelState.LOADED)).toBe(true);
            expect(canBeginTransition('unload', LevelState.ACTIVE)).toBe(false);
            expect(canBeginTransition('unload', LevelState.NONE)).toBe(false);
        });
    });

    describe('TRANSITION_TABLE', () => {
        it('routes every asynchronous transition through an in-flight state', () => {
            expect(TRANSITION_TABLE.load.via).toBe(LevelState.LOADING);
            expect(TRANSITION_TABLE.activate.via).toBe(LevelState.ACTIVATING);
            expect(TRANSITION_TABLE.unload.via).toBe(LevelState.UNLOADING);
            expect(TRANSITION_TABLE.deactivate.via).toBe(null);
        });

        it('returns unloaded levels to NONE', () => {
            expect(TRANSITION_TABLE.unload.to).toBe(LevelState.NONE);
        });
    });

    describe('inFlightTransition', () => {
        it('maps in-flight states to their transition', () => {
            expect(inFlightTransition(LevelState.LOADING)).toBe('load');
            expect(inFlightTransition(LevelState.ACTIVATING)).toBe('activate');
            expect(inFlightTransition(LevelState.UNLOADING)).toBe('unload');
        });

        it('returns null for settled states', () => {
            expect(inFlightTransition(LevelState.ACTIVE)).toBe(null);
            expect(isInFlightState(LevelState.DEACTIVATED)).toBe(false);
            expect(isInFlightState(LevelState.LOADING)).toBe(true);
        });
    });
});
