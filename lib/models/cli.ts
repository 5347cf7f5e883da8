/**
 * Command line arguments after parsing
 */
export type CliArguments = {
    command: string;
    destination?: string;
    catalog?: string;
    includeOldVersions: boolean;
    verbose: boolean;
    help: boolean;
}
