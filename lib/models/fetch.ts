import { IFileSystem, IHttpClient, IProcessExecutor, IProgressBarFactory, IZipExtractor } from '../interfaces';
import { RuntimeEntry } from './catalog';

/**
 * Collaborators shared by the tool fetcher, the extractors and the orchestrator
 */
export type Toolbox = {
    fileSystem: IFileSystem;
    httpClient: IHttpClient;
    processExecutor: IProcessExecutor;
    zipExtractor: IZipExtractor;
    progressBarFactory?: IProgressBarFactory;
    signal?: AbortSignal;
    verbose: boolean;
}

/**
 * Options for a fetch run
 */
export type FetchOptions = Partial<Omit<Toolbox, 'verbose'>> & {
    /** Directory holding Downloads/ and the vcruntime_<version> outputs */
    destination: string;
    includeOldVersions?: boolean;
    catalog?: RuntimeEntry[];
    verbose?: boolean;
}

export type EntryStatus = 'filtered' | 'already-extracted' | 'unsupported' | 'extracted' | 'failed';

/**
 * What happened to one catalog entry during a run
 */
export type EntryResult = {
    version: string;
    status: EntryStatus;
    outputDirectory?: string;
    error?: Error;
}
