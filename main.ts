#!/usr/bin/env node
import { executeCommand } from './lib/command-router';

/**
 * Downloads and extracts the Visual C++ Redistributables, one directory per
 * runtime version, for matching against crash dumps.
 */
async function main(): Promise<void> {
    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\nStopping after the current runtime...');
        controller.abort();
    });

    process.exitCode = await executeCommand(process.argv.slice(2), controller.signal);
}

main().catch((error: unknown) => {
    console.error('Error:', error);
    process.exitCode = 1;
});
