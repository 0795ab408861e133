import type { CommandInput } from '../L0/Ontology.js';
import { renounceOwnership, transferOwnership } from '../L1/Access.js';
import type { LedgerState, Transition } from '../L2/State.js';
import { pause, unpause } from '../L3/Switch.js';
import { approve, transfer, transferFrom } from './Ledger.js';
import { setAssetInfo } from './Metadata.js';
import { burn, mint } from './Supply.js';

/**
 * Routes a command to its operation against the given state record.
 */
export function applyCommand(state: LedgerState, command: CommandInput): Transition {
    const { caller } = command;
    switch (command.op) {
        case 'transfer': return transfer(state, caller, command.to, command.amount);
        case 'approve': return approve(state, caller, command.spender, command.amount);
        case 'transferFrom': return transferFrom(state, caller, command.from, command.to, command.amount);
        case 'mint': return mint(state, caller, command.to, command.amount);
        case 'burn': return burn(state, caller, command.amount);
        case 'pause': return pause(state, caller);
        case 'unpause': return unpause(state, caller);
        case 'setAssetInfo': return setAssetInfo(state, caller, command.uri);
        case 'transferOwnership': return transferOwnership(state, caller, command.newOwner);
        case 'renounceOwnership': return renounceOwnership(state, caller);
        default: {
            const unreachable: never = command;
            throw new Error(`Unhandled command op: ${String(Reflect.get(unreachable, 'op'))}`);
        }
    }
}
