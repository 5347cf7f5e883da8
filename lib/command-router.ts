import { fetchAll } from './fetch';
import { defaultCatalog, filterCatalog, readCatalogFile } from './catalog';
import { resolveDestination } from './config';
import { describeError } from './errors';
import { parseArguments, UsageError } from './cli';
import { CliProgressBarFactory, SilentProgressBarFactory } from './ui';
import { CliArguments, EntryResult, RuntimeEntry } from './models';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function loadCatalogFor(args: CliArguments): RuntimeEntry[] {
    return args.catalog ? readCatalogFile(args.catalog) : defaultCatalog();
}

/**
 * Prints the run summary and returns the exit status
 */
function reportResults(results: EntryResult[]): number {
    const count = (status: EntryResult['status']) => results.filter(r => r.status === status).length;
    const failed = results.filter(r => r.status === 'failed');

    console.log('\nAll operations completed.');
    console.log(`Extracted: ${count('extracted')}, Already had: ${count('already-extracted')}, Skipped: ${count('unsupported')}, Failed: ${failed.length}`);

    if (failed.length > 0) {
        console.log('\nFailed extractions:');
        failed.forEach(r => {
            console.log(`  ✗ ${r.version}: ${r.error?.message || 'Unknown error'}`);
        });
        return EXIT_FAILURE;
    }
    return EXIT_SUCCESS;
}

async function runFetch(args: CliArguments, signal?: AbortSignal): Promise<number> {
    const destination = resolveDestination(args.destination);
    const results = await fetchAll({
        destination,
        includeOldVersions: args.includeOldVersions,
        catalog: loadCatalogFor(args),
        verbose: args.verbose,
        signal,
        progressBarFactory: process.stdout.isTTY ? new CliProgressBarFactory() : new SilentProgressBarFactory(),
    });
    return reportResults(results);
}

function runList(args: CliArguments): number {
    const entries = filterCatalog(loadCatalogFor(args), args.includeOldVersions);
    if (entries.length === 0) {
        console.log('No runtimes to fetch.');
        return EXIT_SUCCESS;
    }
    const width = Math.max(...entries.map(e => e.version.length));
    entries.forEach(e => {
        console.log(`${e.version.padEnd(width)}  ${e.label ?? ''}  ${e.url}`);
    });
    return EXIT_SUCCESS;
}

/**
 * Executes the command named on the command line and returns the exit status
 */
export async function executeCommand(argv: string[], signal?: AbortSignal): Promise<number> {
    let args: CliArguments;
    try {
        args = parseArguments(argv);
    } catch (error) {
        if (error instanceof UsageError) {
            console.error(error.message);
            console.log('Type "help" for usage information.');
            return EXIT_USAGE;
        }
        throw error;
    }

    try {
        switch (args.command) {
            case 'fetch':
                if (args.help) {
                    printFetchHelp();
                    return EXIT_SUCCESS;
                }
                return await runFetch(args, signal);

            case 'list':
            case 'ls':
                if (args.help) {
                    printListHelp();
                    return EXIT_SUCCESS;
                }
                return runList(args);

            case 'help':
                printHelp();
                return EXIT_SUCCESS;

            default:
                console.error(`Unknown command: ${args.command}`);
                console.log('Type "help" for usage information.');
                return EXIT_USAGE;
        }
    } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        return EXIT_FAILURE;
    }
}

/**
 * Prints help for fetch command
 */
function printFetchHelp(): void {
    console.log(`
fetch - Download the Visual C++ runtimes and extract their files

Usage:
  fetch [options]

Options:
  --destination <dir>       Directory holding Downloads\\ and the extracted runtimes
                            (default: $VCRUNTIME_DESTINATION or D:\\Microsoft\\Runtimes)
  --include-old-versions    Include runtimes older than version 14 (Visual C++ 2015)
  --catalog <file>          Read the runtime list from a JSON file
  --verbose, -v             Show the output of the extraction tools

By default every 14.x (Visual C++ 2015-2022) release in the built-in
catalog is fetched, 40 installers. Pass --catalog to fetch fewer.

The Downloads directory must exist before the first run.
`);
}

/**
 * Prints help for list command
 */
function printListHelp(): void {
    console.log(`
list, ls - Show the runtimes a fetch would process

Usage:
  list [--include-old-versions] [--catalog <file>]
`);
}

/**
 * Prints general help
 */
function printHelp(): void {
    console.log(`
Visual C++ Runtime Fetcher

Commands:
  fetch             Download and extract runtimes (default)
  list, ls          Show the runtimes a fetch would process
  help              Show this help

Use "<command> --help" for details on a command.
`);
}

