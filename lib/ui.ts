import * as cliProgress from 'cli-progress';
import { IProgressBar, IProgressBarFactory } from './interfaces/progress-interface';
import { ProgressBarProps } from './models';

/**
 * Wrapper for cli-progress progress bar to match our interface
 */
class CliProgressBarWrapper implements IProgressBar {
    private bar: cliProgress.SingleBar;

    constructor(bar: cliProgress.SingleBar) {
        this.bar = bar;
    }

    setTotal(total: number): void {
        this.bar.setTotal(total);
    }

    update(value: number): void {
        this.bar.update(value);
    }

    stop(): void {
        this.bar.stop();
    }
}

/**
 * Default progress bar factory implementation. Downloads run one at a time,
 * so each gets its own single bar.
 */
export class CliProgressBarFactory implements IProgressBarFactory {
    private readonly props: ProgressBarProps;

    constructor(props: ProgressBarProps = {}) {
        this.props = props;
    }

    createBar(name: string, total: number): IProgressBar {
        const bar = new cliProgress.SingleBar({
            format: this.props.format ?? '{name} |{bar}| {percentage}% | {value}/{total} bytes | ETA: {eta}s',
            barCompleteChar: this.props.barCompleteChar ?? '█',
            barIncompleteChar: this.props.barIncompleteChar ?? '░',
            hideCursor: this.props.hideCursor ?? true,
            clearOnComplete: this.props.clearOnComplete ?? true,
            stopOnComplete: this.props.stopOnComplete ?? true,
        }, this.props.preset ?? cliProgress.Presets.shades_classic);

        bar.start(total, 0, { name });
        return new CliProgressBarWrapper(bar);
    }
}

/**
 * Progress bar factory that draws nothing
 */
export class SilentProgressBarFactory implements IProgressBarFactory {
    createBar(): IProgressBar {
        return {
            setTotal: () => undefined,
            update: () => undefined,
            stop: () => undefined,
        };
    }
}
