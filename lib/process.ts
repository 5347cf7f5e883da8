import * as path from 'path';
import { IProcessExecutor, NodeProcessExecutor } from './interfaces/process-interface';
import { ExtractionError } from './errors';
import { ProcessOptions, ProcessResponse } from './models';
import { TOOL_TIMEOUT_MS } from './config';

/**
 * Low-level function to execute an external tool
 */
export async function executeProcess(
    executablePath: string,
    args: string[],
    options: ProcessOptions = {},
    processExecutor?: IProcessExecutor,
): Promise<ProcessResponse> {
    const { silent = true, timeout = TOOL_TIMEOUT_MS } = options;
    const executor = processExecutor || new NodeProcessExecutor();

    return new Promise((resolve) => {
        const child = executor.spawn(executablePath, args, {
            stdio: silent ? 'ignore' : 'inherit',
            shell: false,
        });

        let timedOut = false;
        const timeoutId = timeout > 0 ? setTimeout(() => {
            timedOut = true;
            child.kill();
            resolve({
                success: false,
                exitCode: null,
                error: 'Process execution timed out',
            });
        }, timeout) : null;

        child.on('close', (code) => {
            if (timeoutId) clearTimeout(timeoutId);
            if (timedOut) return;

            resolve({
                success: code === 0,
                exitCode: code,
                error: code !== 0 ? `Process exited with code ${code}` : undefined,
            });
        });

        child.on('error', (error) => {
            if (timeoutId) clearTimeout(timeoutId);

            let errorMessage = error.message;
            if (error.code === 'EACCES') {
                errorMessage = `Access denied: ${executablePath}. (Original error: ${error.message})`;
            } else if (error.code === 'ENOENT') {
                errorMessage = `Executable not found: ${executablePath}.`;
            }

            resolve({
                success: false,
                exitCode: null,
                error: errorMessage,
            });
        });
    });
}

/**
 * Runs an extraction tool and throws if it did not exit cleanly
 */
export async function runTool(
    executablePath: string,
    args: string[],
    options: ProcessOptions = {},
    processExecutor?: IProcessExecutor,
): Promise<void> {
    if (options.silent === false) {
        console.log(`> ${executablePath} ${args.join(' ')}`);
    }

    const response = await executeProcess(executablePath, args, options, processExecutor);
    if (!response.success) {
        throw new ExtractionError(
            `${path.basename(executablePath)} failed: ${response.error ?? 'unknown error'}`,
        );
    }
}
