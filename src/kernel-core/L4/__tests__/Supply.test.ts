import { describe, test, expect, beforeEach } from '@jest/globals';
import { burn, maxSupply, mint } from '../Supply.js';
import { assetInfo, setAssetInfo } from '../Metadata.js';
import { balanceOf, totalSupply } from '../Ledger.js';
import { pause } from '../../L3/Switch.js';
import { renounceOwnership } from '../../L1/Access.js';
import type { LedgerState } from '../../L2/State.js';
import { NULL_ACCOUNT } from '../../L0/Primitives.js';
import { AuthorizationError, ErrorCode, InsufficientFundsError, InvalidArgumentError, StateError, SupplyCapError } from '../../Errors.js';
import { ALICE, BOB, OWNER, genesisState } from '../../__tests__/fixtures.js';

describe('Supply Governor', () => {
    let state: LedgerState;

    beforeEach(() => {
        state = genesisState();
    });

    test('mint up to exactly the cap succeeds', () => {
        const { state: next, events } = mint(state, OWNER, BOB, 4000n);

        expect(totalSupply(next)).toBe(5000n);
        expect(balanceOf(next, BOB)).toBe(4000n);
        expect(events).toEqual([{ type: 'Transfer', from: NULL_ACCOUNT, to: BOB, amount: 4000n }]);
    });

    test('one unit past the cap is rejected with SupplyCapError', () => {
        const full = mint(state, OWNER, BOB, 4000n).state;
        expect(() => mint(full, OWNER, BOB, 1n)).toThrow(SupplyCapError);
        expect(() => mint(state, OWNER, BOB, 4001n)).toThrow(SupplyCapError);
    });

    test('mint rejects rather than clamps', () => {
        expect(() => mint(state, OWNER, BOB, 4001n)).toThrow();
        expect(totalSupply(state)).toBe(1000n);
        expect(balanceOf(state, BOB)).toBe(0n);
    });

    test('maxSupply is unaffected by issuance and destruction', () => {
        const next = burn(mint(state, OWNER, BOB, 10n).state, OWNER, 5n).state;
        expect(maxSupply(next)).toBe(5000n);
    });

    test('mint to the null account is rejected', () => {
        expect(() => mint(state, OWNER, NULL_ACCOUNT, 1n)).toThrow(InvalidArgumentError);
    });

    test('only the owner may mint or burn', () => {
        expect(() => mint(state, ALICE, ALICE, 1n)).toThrow(AuthorizationError);
        expect(() => burn(state, ALICE, 0n)).toThrow(AuthorizationError);
    });

    test('burn destroys from the owner balance and emits Transfer to null', () => {
        const { state: next, events } = burn(state, OWNER, 300n);

        expect(totalSupply(next)).toBe(700n);
        expect(balanceOf(next, OWNER)).toBe(700n);
        expect(events).toEqual([{ type: 'Transfer', from: OWNER, to: NULL_ACCOUNT, amount: 300n }]);
    });

    test('burn past the owner balance is rejected', () => {
        expect(() => burn(state, OWNER, 1001n)).toThrow(InsufficientFundsError);
    });

    test('burn frees headroom under the cap', () => {
        const next = mint(burn(state, OWNER, 1000n).state, OWNER, ALICE, 5000n).state;
        expect(totalSupply(next)).toBe(5000n);
    });

    test('issuance and destruction are gated by the switch', () => {
        const halted = pause(state, OWNER).state;
        expect(() => mint(halted, OWNER, BOB, 1n)).toThrow(StateError);
        expect(() => burn(halted, OWNER, 1n)).toThrow(StateError);
    });

    test('the owner check precedes the switch check', () => {
        const halted = pause(state, OWNER).state;
        expect(() => mint(halted, ALICE, BOB, 1n)).toThrow(AuthorizationError);
    });
});

describe('Asset Metadata Pointer', () => {
    let state: LedgerState;

    beforeEach(() => {
        state = genesisState();
    });

    test('starts empty', () => {
        expect(assetInfo(state)).toBe('');
    });

    test('setAssetInfo overwrites and notifies with the caller', () => {
        const { state: next, events } = setAssetInfo(state, OWNER, 'ipfs://asset/1');
        expect(assetInfo(next)).toBe('ipfs://asset/1');
        expect(events).toEqual([{ type: 'AssetInfoUpdated', uri: 'ipfs://asset/1', updatedBy: OWNER }]);
    });

    test('setting the same value notifies again', () => {
        const first = setAssetInfo(state, OWNER, 'ipfs://asset/1').state;
        const { events } = setAssetInfo(first, OWNER, 'ipfs://asset/1');
        expect(events).toHaveLength(1);
    });

    test('is not gated by the switch', () => {
        const halted = pause(state, OWNER).state;
        expect(assetInfo(setAssetInfo(halted, OWNER, 'https://example.test/a').state)).toBe('https://example.test/a');
    });

    test('is owner-only', () => {
        expect(() => setAssetInfo(state, ALICE, 'x')).toThrow(AuthorizationError);
    });

    test('is unreachable after renouncement', () => {
        const renounced = renounceOwnership(state, OWNER).state;
        try {
            setAssetInfo(renounced, OWNER, 'x');
            throw new Error('expected rejection');
        } catch (e) {
            expect(e).toBeInstanceOf(AuthorizationError);
            expect(e instanceof AuthorizationError && e.code).toBe(ErrorCode.OWNERSHIP_RENOUNCED);
        }
    });
});
