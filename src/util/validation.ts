import { ContractViolationError } from '../errors';

export function validateSource(source: unknown): void {
    if (!isIterable(source)) {
        throw new ContractViolationError(`The input sequence must be iterable. Received: ${source === null ? 'null' : typeof source}`);
    }
}

export function validateProjection(projection: unknown, role: string): void {
    if (typeof projection !== 'function') {
        throw new ContractViolationError(`The ${role} projection must be a function. Received: ${typeof projection}`);
    }
}

/**
 * Checks counts supplied by callers (top-k sizes, sizing hints).
 */
export function validateCount(count: number, name: string): void {
    if (!Number.isSafeInteger(count) || count < 0) {
        throw new ContractViolationError(`${name} must be a non-negative integer. Received: ${count}`);
    }
}

export function validateDestination(destination: unknown, operation: string): void {
    if (!(destination instanceof Map)) {
        throw new ContractViolationError(`${operation} expects a Map as its destination`);
    }
}

function isIterable(value: unknown): value is Iterable<unknown> {
    if (typeof value === 'string') {
        return true;
    }
    return typeof value === 'object' &&
        value !== null &&
        Symbol.iterator in value &&
        typeof value[Symbol.iterator] === 'function';
}
