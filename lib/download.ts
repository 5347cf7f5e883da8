import * as path from 'path';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { IHttpClient, AxiosHttpClient } from './interfaces/http-interface';
import { IProgressBar } from './interfaces/progress-interface';
import { CancelledError, DownloadError } from './errors';
import { DownloadOptions } from './models';

const PARTIAL_SUFFIX = '.part';

/**
 * Downloads a URL to a file unless the file is already there.
 *
 * The body is written to `<destination>.part` and renamed into place once the
 * write stream has closed, so an interrupted download never looks like a
 * cached one. Returns the destination path.
 */
export async function downloadFile(
    url: string,
    destination: string,
    options: DownloadOptions = {},
): Promise<string> {
    const fs: IFileSystem = options.fileSystem || new NodeFileSystem();
    const http: IHttpClient = options.httpClient || new AxiosHttpClient();

    if (fs.existsSync(destination)) {
        return destination;
    }

    const dir = path.dirname(destination);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }

    const partialPath = destination + PARTIAL_SUFFIX;
    let progressBar: IProgressBar | undefined;

    try {
        const response = await http.request({
            method: 'GET',
            url,
            responseType: 'stream',
            signal: options.signal,
        });

        const totalLength = parseInt(String(response.headers['content-length'] ?? '0'), 10) || 0;
        if (totalLength > 0 && options.progressBarFactory) {
            progressBar = options.progressBarFactory.createBar(path.basename(destination), totalLength);
        }

        let downloadLength = 0;
        const writer = fs.createWriteStream(partialPath);

        const body = response.data;

        // Settle only once the writer has closed, so the partial file can be removed
        await new Promise<void>((resolve, reject) => {
            let failure: Error | undefined;

            const onData = (chunk: Buffer) => {
                // keep-alive chunks carry no bytes
                if (chunk.length === 0) {
                    return;
                }
                downloadLength += chunk.length;
                progressBar?.update(downloadLength);
                options.onProgress?.({ loaded: downloadLength, total: totalLength });
            };

            body.on('data', onData);
            body.on('error', (error: Error) => {
                failure = error;
                writer.end();
            });
            writer.on('error', (error: Error) => {
                // stop reading the rest of the response
                body.off('data', onData);
                body.unpipe();
                body.destroy();
                reject(error);
            });
            writer.on('close', () => {
                if (failure) {
                    reject(failure);
                } else {
                    resolve();
                }
            });
            body.pipe(writer);
        });

        fs.renameSync(partialPath, destination);
        return destination;
    } catch (error) {
        if (fs.existsSync(partialPath)) {
            fs.unlinkSync(partialPath);
        }
        if (options.signal?.aborted) {
            throw new CancelledError();
        }
        throw new DownloadError(url, error);
    } finally {
        progressBar?.stop();
    }
}
