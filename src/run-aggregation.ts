import * as fs from 'fs';
import { parseJobArguments, runAggregationJob } from './aggregation-job';

/**
 * Aggregation runner script that reads a JSON array, aggregates it by key and
 * writes the result as `{ key, value }` pairs.
 *
 * Usage: ts-node src/run-aggregation.ts <input.json> <output.json> <operation> <keys> [valueProperty | k]
 *
 * Operations: count, group, sum, average, minmax, top
 *
 * Example:
 *   ts-node src/run-aggregation.ts sales.json totals.json sum region,year total
 */

function printUsage(): void {
    console.error('Usage: ts-node src/run-aggregation.ts <input.json> <output.json> <operation> <keys> [valueProperty | k]');
    console.error('');
    console.error('Operations:');
    console.error('  count   <keys>                 number of items per key');
    console.error('  group   <keys>                 items per key');
    console.error('  sum     <keys> <valueProperty> total of a numeric property per key');
    console.error('  average <keys> <valueProperty> mean of a numeric property per key');
    console.error('  minmax  <keys> <valueProperty> smallest and largest value per key');
    console.error('  top     <keys> [k]             the k most frequent keys (default 10)');
    console.error('');
    console.error('Example:');
    console.error('  ts-node src/run-aggregation.ts sales.json totals.json sum region,year total');
}

function main(): void {
    const args = process.argv.slice(2);

    if (args.length < 4) {
        printUsage();
        process.exit(1);
    }

    const [inputPath, outputPath, ...jobArgs] = args;

    if (!fs.existsSync(inputPath)) {
        console.error(`Error: Input file '${inputPath}' not found`);
        process.exit(1);
    }

    try {
        const job = parseJobArguments(jobArgs);

        console.log(`Reading input from: ${inputPath}`);
        const inputData: unknown = JSON.parse(fs.readFileSync(inputPath, 'utf-8'));

        if (!Array.isArray(inputData)) {
            throw new Error('Input JSON must be an array of objects');
        }

        console.log(`Running ${job.operation} over ${inputData.length} items by ${job.keys.join(', ')}...`);
        const result = runAggregationJob(inputData, job);

        console.log(`Writing results to: ${outputPath}`);
        fs.writeFileSync(outputPath, JSON.stringify(result, null, 2), 'utf-8');

        console.log('✓ Aggregation completed successfully');
        console.log(`✓ Output written to: ${outputPath}`);
        console.log(`✓ Generated ${result.length} keys`);
    } catch (error) {
        console.error('Error running aggregation:');
        if (error instanceof Error) {
            console.error(error.message);
            if (error.stack) {
                console.error('\nStack trace:');
                console.error(error.stack);
            }
        } else {
            console.error(error);
        }
        process.exit(1);
    }
}

main();
