export type {
    Accumulator,
    ByKeyOptions,
    Defined,
    FinalizingAccumulator,
    KeyProjection,
    OrderProjection,
    Ordering,
    Predicate,
    ValueProjection
} from './kernel';
export { reduceByKey, finalizeAll } from './kernel';

export type { KeyEquality, KeyedArray } from './association';
export { StructuralMap, createAssociation, getOrThrow, countOf, toKeyedArray } from './association';

export type { AverageState, Summable } from './accumulators';
export { count, average, plus } from './accumulators';

// Keyed operations
export { countBy } from './operations/count-by';
export type { IndexByIntoOptions, IndexByOptions } from './operations/index-by';
export { indexBy, indexByInto } from './operations/index-by';
export type { GroupByIntoOptions } from './operations/group-by';
export { groupBy, groupByInto } from './operations/group-by';
export { foldBy } from './operations/fold-by';
export type { CombineOperator } from './operations/transform-reduce-by';
export { transformReduceBy } from './operations/transform-reduce-by';
export { accumulateBy } from './operations/accumulate-by';
export type { Extrema, ExtremaOptions } from './operations/extrema-by';
export { extremaBy, minmaxBy } from './operations/extrema-by';
export type { PairOrdering } from './operations/ranking';
export { topK, topKByValue, bottomKByValue, topKByKey, toSortedPairs } from './operations/ranking';
export type { Partition } from './operations/partition-by';
export { partitionBy } from './operations/partition-by';

export { ByKeyBuilder } from './builder';
export { from } from './factory';

export { compareNatural, naturalLess } from './util/compare';

export { ErrorCode, ByKeyError, KeyNotFoundError, ContractViolationError } from './errors';
