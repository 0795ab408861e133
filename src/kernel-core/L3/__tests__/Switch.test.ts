import { describe, test, expect, beforeEach } from '@jest/globals';
import { isPaused, pause, requireActive, unpause } from '../Switch.js';
import { transfer } from '../../L4/Ledger.js';
import { renounceOwnership } from '../../L1/Access.js';
import type { LedgerState } from '../../L2/State.js';
import { AuthorizationError, ErrorCode, InvalidTransitionError, KernelError, StateError } from '../../Errors.js';
import { ALICE, OWNER, genesisState } from '../../__tests__/fixtures.js';

describe('Operational Switch', () => {
    let state: LedgerState;

    beforeEach(() => {
        state = genesisState();
    });

    test('starts ACTIVE', () => {
        expect(isPaused(state)).toBe(false);
        expect(() => requireActive(state)).not.toThrow();
    });

    test('pause halts and emits Paused with the caller', () => {
        const { state: next, events } = pause(state, OWNER);
        expect(isPaused(next)).toBe(true);
        expect(events).toEqual([{ type: 'Paused', account: OWNER }]);
        expect(() => requireActive(next)).toThrow(StateError);
    });

    test('unpause restores and emits Unpaused', () => {
        const { state: next, events } = unpause(pause(state, OWNER).state, OWNER);
        expect(isPaused(next)).toBe(false);
        expect(events).toEqual([{ type: 'Unpaused', account: OWNER }]);
        expect(transfer(next, OWNER, ALICE, 1n).events).toHaveLength(1);
    });

    test('pausing twice is rejected, not a no-op', () => {
        const halted = pause(state, OWNER).state;
        let caught: unknown;
        try { pause(halted, OWNER); } catch (e) { caught = e; }

        expect(caught).toBeInstanceOf(InvalidTransitionError);
        expect(caught instanceof KernelError && caught.code).toBe(ErrorCode.ALREADY_PAUSED);
    });

    test('unpausing an active ledger is rejected', () => {
        let caught: unknown;
        try { unpause(state, OWNER); } catch (e) { caught = e; }

        expect(caught).toBeInstanceOf(InvalidTransitionError);
        expect(caught instanceof KernelError && caught.code).toBe(ErrorCode.NOT_PAUSED);
    });

    test('transitions are owner-only, and the owner check comes first', () => {
        expect(() => pause(state, ALICE)).toThrow(AuthorizationError);
        expect(() => unpause(state, ALICE)).toThrow(AuthorizationError);
    });

    test('a ledger renounced while halted stays halted', () => {
        const renounced = renounceOwnership(pause(state, OWNER).state, OWNER).state;
        expect(isPaused(renounced)).toBe(true);
        expect(() => unpause(renounced, OWNER)).toThrow(AuthorizationError);
    });
});
