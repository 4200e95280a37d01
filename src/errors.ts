/**
 * Typed errors raised by keyed-aggregate.
 *
 * - ByKeyError: base class, carries an ErrorCode
 *   - KeyNotFoundError: lookup of a key that a result association does not hold
 *   - ContractViolationError: misuse detected before any element is visited
 *
 * Errors thrown by caller-supplied projections are never wrapped.
 */

export enum ErrorCode {
    KEY_NOT_FOUND = 'KEY_NOT_FOUND',
    CONTRACT_VIOLATION = 'CONTRACT_VIOLATION',
}

export class ByKeyError extends Error {
    constructor(message: string, readonly code: ErrorCode) {
        super(message);
        this.name = new.target.name;
    }
}

export class KeyNotFoundError extends ByKeyError {
    constructor(readonly key: unknown) {
        super(`Key not found: ${describeKey(key)}`, ErrorCode.KEY_NOT_FOUND);
    }
}

export class ContractViolationError extends ByKeyError {
    constructor(message: string) {
        super(message, ErrorCode.CONTRACT_VIOLATION);
    }
}

function describeKey(key: unknown): string {
    if (typeof key === 'string') {
        return `"${key}"`;
    }
    if (typeof key === 'bigint') {
        return `${key}n`;
    }
    if (typeof key === 'object' && key !== null) {
        try {
            return JSON.stringify(key);
        } catch {
            return Object.prototype.toString.call(key);
        }
    }
    return String(key);
}
