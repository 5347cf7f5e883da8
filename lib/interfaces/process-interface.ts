import { spawn, StdioOptions } from 'child_process';

/**
 * The part of a spawned child process the runner listens to
 */
export interface ProcessHandle {
    on(event: 'close', listener: (code: number | null) => void): unknown;
    on(event: 'error', listener: (error: NodeJS.ErrnoException) => void): unknown;
    kill(): boolean;
}

export type SpawnOptions = {
    stdio?: StdioOptions;
    shell?: boolean;
};

/**
 * Process execution abstraction interface for testability
 */
export interface IProcessExecutor {
    spawn(command: string, args: string[], options?: SpawnOptions): ProcessHandle;
}

/**
 * Default implementation using Node.js child_process
 */
export class NodeProcessExecutor implements IProcessExecutor {
    spawn(command: string, args: string[], options?: SpawnOptions): ProcessHandle {
        return spawn(command, args, options ?? {});
    }
}
