import { expectAssignable, expectNotAssignable, expectType } from 'tsd';
import { accumulateBy, average, countBy, extremaBy, from, groupBy, groupByInto, indexByInto, partitionBy, toKeyedArray, transformReduceBy } from '../index';
import type { Extrema, GroupByIntoOptions, IndexByIntoOptions, KeyedArray, Partition } from '../index';

interface Sale {
    region: string;
    year: number;
    total: number;
}

declare const sales: Sale[];

// Counts keep the key type of the projection
{
    expectType<Map<string, number>>(countBy(sales, sale => sale.region));
    expectType<Map<number, number>>(countBy(sales, sale => sale.year));
}

// Grouping without a value projection keeps whole elements
{
    expectType<Map<string, Sale[]>>(groupBy(sales, sale => sale.region));
    expectType<Map<string, number[]>>(groupBy(sales, sale => sale.region, sale => sale.total));
    expectType<Map<string, Sale[]>>(groupBy(sales, sale => sale.region, { keyEquality: 'structural' }));
}

// Into variants take no keyEquality: the destination decides it
{
    expectType<GroupByIntoOptions | undefined>({} as Parameters<typeof groupByInto>[4]);
    expectType<IndexByIntoOptions | undefined>({} as Parameters<typeof indexByInto>[4]);
    expectNotAssignable<GroupByIntoOptions>({ keyEquality: 'structural' });
}

// A bigint initial value makes bigint sums
{
    expectType<Map<string, number>>(accumulateBy(sales, sale => sale.region, sale => sale.total));
    expectType<Map<string, bigint>>(accumulateBy(sales, sale => sale.region, sale => BigInt(sale.total), 0n));
}

// Finalizing accumulators report the finalized type
{
    expectType<Map<string, number | undefined>>(transformReduceBy(sales, sale => sale.region, sale => sale.total, average()));
}

// Extrema carry the value type, not the ordering type
{
    expectType<Map<string, Extrema<Sale>>>(extremaBy(sales, sale => sale.region, sale => sale, sale => sale.year));
}

// Partitions follow the value projection
{
    expectType<Partition<Sale>>(partitionBy(sales, sale => sale.total > 50));
    expectType<Partition<string>>(partitionBy(sales, sale => sale.total > 50, sale => sale.region));
}

// Builder stages change the element type
{
    expectType<Map<string, number>>(from(sales).map(sale => sale.region).countBy(region => region));
    expectAssignable<KeyedArray<number, string>>(toKeyedArray(countBy(sales, sale => sale.region)));
}
