import { ContractViolationError } from './errors';
import type { Accumulator, FinalizingAccumulator } from './kernel';

export type Summable = number | bigint;

/**
 * Tracks sum and count separately for computing an average.
 */
export interface AverageState {
    sum: number;
    count: number;
}

export function count(): Accumulator<unknown, number> {
    return {
        identity: () => 0,
        combine: (acc) => acc + 1
    };
}

/**
 * Mean of the contributed values. Null and undefined contributions are
 * excluded from both the sum and the count; a key that only received such
 * values finalizes to undefined.
 */
export function average(): FinalizingAccumulator<number | null | undefined, AverageState, number | undefined> {
    return {
        identity: () => ({ sum: 0, count: 0 }),
        combine: (state, value) => {
            if (value !== null && value !== undefined) {
                state.sum += value;
                state.count++;
            }
            return state;
        },
        finalize: (state) => state.count > 0 ? state.sum / state.count : undefined
    };
}

/**
 * Adds two summable values of the same kind.
 */
export function plus(left: Summable, right: Summable): Summable {
    if (typeof left === 'number' && typeof right === 'number') {
        return left + right;
    }
    if (typeof left === 'bigint' && typeof right === 'bigint') {
        return left + right;
    }
    throw new ContractViolationError(`Cannot add ${typeof left} and ${typeof right}`);
}
