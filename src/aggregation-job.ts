import { average } from './accumulators';
import { toKeyedArray, type KeyedArray } from './association';
import { ContractViolationError } from './errors';
import type { ByKeyOptions, KeyProjection } from './kernel';
import { accumulateBy } from './operations/accumulate-by';
import { countBy } from './operations/count-by';
import { minmaxBy } from './operations/extrema-by';
import { groupBy } from './operations/group-by';
import { topKByValue } from './operations/ranking';
import { transformReduceBy } from './operations/transform-reduce-by';
import { validateCount } from './util/validation';

export type AggregationOperation = 'count' | 'group' | 'sum' | 'average' | 'minmax' | 'top';

const operations: readonly AggregationOperation[] = ['count', 'group', 'sum', 'average', 'minmax', 'top'];

const DEFAULT_TOP_K = 10;

export interface AggregationJob {
    operation: AggregationOperation;
    /** Property names the records are keyed by */
    keys: string[];
    /** Property holding the number to sum, average or bound */
    valueProperty?: string;
    /** Number of keys reported by 'top' */
    k: number;
}

export type InputRecord = Record<string, unknown>;

/**
 * Reads the job description that follows the input and output paths on the
 * command line: `<operation> <keys> [valueProperty]` for sum, average and
 * minmax, `top <keys> [k]`, and `<operation> <keys>` otherwise.
 *
 * @example
 * parseJobArguments(['sum', 'region,year', 'total'])
 * // { operation: 'sum', keys: ['region', 'year'], valueProperty: 'total', k: 10 }
 */
export function parseJobArguments(args: string[]): AggregationJob {
    const [operation, keyList, extra, ...rest] = args;
    if (!isOperation(operation)) {
        throw new ContractViolationError(`Unknown operation '${operation}'. Expected one of: ${operations.join(', ')}`);
    }
    if (keyList === undefined) {
        throw new ContractViolationError(`The ${operation} operation needs a comma-separated list of key properties`);
    }
    const keys = keyList.split(',').map(name => name.trim()).filter(name => name.length > 0);
    if (keys.length === 0) {
        throw new ContractViolationError('At least one key property is required');
    }
    if (rest.length > 0) {
        throw new ContractViolationError(`Unexpected arguments: ${rest.join(' ')}`);
    }

    switch (operation) {
        case 'sum':
        case 'average':
        case 'minmax':
            if (extra === undefined) {
                throw new ContractViolationError(`The ${operation} operation needs a value property`);
            }
            return { operation, keys, valueProperty: extra, k: DEFAULT_TOP_K };
        case 'top': {
            const k = extra === undefined ? DEFAULT_TOP_K : Number(extra);
            validateCount(k, 'k');
            return { operation, keys, k };
        }
        default:
            if (extra !== undefined) {
                throw new ContractViolationError(`The ${operation} operation takes no value property`);
            }
            return { operation, keys, k: DEFAULT_TOP_K };
    }
}

/**
 * Runs one aggregation over parsed JSON records and returns the result as
 * `{ key, value }` pairs. Several key properties key each record by an
 * object of those properties, compared by value.
 */
export function runAggregationJob(records: unknown[], job: AggregationJob): KeyedArray<unknown, unknown> {
    const items = records.map(toRecord);
    const key = keyProjection(job.keys);
    const options: ByKeyOptions = job.keys.length > 1 ? { keyEquality: 'structural' } : {};

    switch (job.operation) {
        case 'count':
            return toKeyedArray(countBy(items, key, options));
        case 'group':
            return toKeyedArray(groupBy(items, key, item => item, options));
        case 'sum': {
            const values = readNumbers(items, requireValueProperty(job));
            return toKeyedArray(accumulateBy(items, key, (_, index) => values[index], options));
        }
        case 'average': {
            const values = readOptionalNumbers(items, requireValueProperty(job));
            const means = transformReduceBy(items, key, (_, index) => values[index], average(), options);
            return Array.from(means, ([keyValue, mean]) => ({ key: keyValue, value: mean ?? null }));
        }
        case 'minmax': {
            const values = readNumbers(items, requireValueProperty(job));
            return toKeyedArray(minmaxBy(items, key, (_, index) => values[index], options));
        }
        case 'top':
            return topKByValue(countBy(items, key, options), job.k)
                .map(([keyValue, count]) => ({ key: keyValue, value: count }));
    }
}

function isOperation(candidate: string | undefined): candidate is AggregationOperation {
    return operations.some(operation => operation === candidate);
}

function toRecord(item: unknown, index: number): InputRecord {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
        throw new ContractViolationError(`Input item ${index} must be an object`);
    }
    return Object.fromEntries(Object.entries(item));
}

function keyProjection(keys: string[]): KeyProjection<InputRecord, unknown> {
    if (keys.length === 1) {
        const [name] = keys;
        return record => record[name];
    }
    return record => Object.fromEntries(keys.map(name => [name, record[name]]));
}

function requireValueProperty(job: AggregationJob): string {
    if (job.valueProperty === undefined) {
        throw new ContractViolationError(`The ${job.operation} operation needs a value property`);
    }
    return job.valueProperty;
}

// Checked up front so a bad record fails the job before any aggregation starts
function readNumbers(items: InputRecord[], property: string): number[] {
    return items.map((item, index) => {
        const value = item[property];
        if (typeof value !== 'number') {
            throw new ContractViolationError(`Input item ${index} has no numeric '${property}'`);
        }
        return value;
    });
}

function readOptionalNumbers(items: InputRecord[], property: string): Array<number | null> {
    return items.map((item, index) => {
        const value = item[property];
        if (value === undefined || value === null) {
            return null;
        }
        if (typeof value !== 'number') {
            throw new ContractViolationError(`Input item ${index} has a non-numeric '${property}'`);
        }
        return value;
    });
}
