/**
 * Options for executing a single external tool
 */
export type ProcessOptions = {
    silent?: boolean;
    timeout?: number;
}

/**
 * Response from executing a single external tool
 */
export type ProcessResponse = {
    success: boolean;
    exitCode: number | null;
    error?: string;
}
