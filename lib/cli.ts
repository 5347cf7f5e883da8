import { CliArguments } from './models';

export type { CliArguments };

/**
 * Thrown for unknown options and options missing their value
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

const VALUE_OPTIONS = ['--destination', '--catalog'] as const;
type ValueOption = typeof VALUE_OPTIONS[number];

function isValueOption(name: string): name is ValueOption {
    return VALUE_OPTIONS.some((option) => option === name);
}

/**
 * Parses the process arguments (without the node and script entries) into
 * a command and its options.
 *
 * The first argument that does not start with '-' is the command; it
 * defaults to "fetch". Value options take either `--name value` or
 * `--name=value`.
 */
export function parseArguments(argv: string[]): CliArguments {
    const parsed: CliArguments = {
        command: '',
        includeOldVersions: false,
        verbose: false,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (!arg.startsWith('-')) {
            if (parsed.command) {
                throw new UsageError(`Unexpected argument: ${arg}`);
            }
            parsed.command = arg;
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq >= 0 ? arg.slice(0, eq) : arg;

        if (isValueOption(name)) {
            let value: string | undefined;
            if (eq >= 0) {
                value = arg.slice(eq + 1);
            } else if (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
                value = argv[++i];
            }
            if (!value) {
                throw new UsageError(`Option ${name} requires a value`);
            }
            if (name === '--destination') {
                parsed.destination = value;
            } else {
                parsed.catalog = value;
            }
            continue;
        }

        if (eq >= 0) {
            throw new UsageError(`Option ${name} does not take a value`);
        }

        switch (name) {
            case '--include-old-versions':
                parsed.includeOldVersions = true;
                break;
            case '--verbose':
            case '-v':
                parsed.verbose = true;
                break;
            case '--help':
            case '-h':
                parsed.help = true;
                break;
            default:
                throw new UsageError(`Unknown option: ${name}`);
        }
    }

    if (!parsed.command) {
        parsed.command = 'fetch';
    }

    // list only reads the catalog
    if (parsed.command === 'list' || parsed.command === 'ls') {
        if (parsed.destination !== undefined) {
            throw new UsageError(`Option --destination is not supported by ${parsed.command}`);
        }
        if (parsed.verbose) {
            throw new UsageError(`Option --verbose is not supported by ${parsed.command}`);
        }
    }
    return parsed;
}
