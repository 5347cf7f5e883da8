import * as cliProgress from 'cli-progress';

/**
 * Display options for the per-installer download bars.
 * Unset fields fall back to the defaults in `CliProgressBarFactory`.
 */
export type ProgressBarProps = {
    format?: string;
    barCompleteChar?: string;
    barIncompleteChar?: string;
    hideCursor?: boolean;
    clearOnComplete?: boolean;
    stopOnComplete?: boolean;
    preset?: cliProgress.Preset;
};
