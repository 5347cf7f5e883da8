import { IFileSystem, IHttpClient, IProgressBarFactory } from "../interfaces";

/**
 * Progress information for download operations
 */
export type Progress = {
    loaded: number;
    total: number;
}

/**
 * Options for download operations
 */
export type DownloadOptions = {
    onProgress?: (progress: Progress) => void;
    signal?: AbortSignal;
    fileSystem?: IFileSystem;
    httpClient?: IHttpClient;
    progressBarFactory?: IProgressBarFactory;
}
