import extractZip from 'extract-zip';

/**
 * Zip extraction abstraction interface for testability
 */
export interface IZipExtractor {
    extract(zipPath: string, targetDirectory: string): Promise<void>;
}

/**
 * Default implementation using extract-zip. It requires an absolute target.
 */
export class ExtractZipExtractor implements IZipExtractor {
    async extract(zipPath: string, targetDirectory: string): Promise<void> {
        await extractZip(zipPath, { dir: targetDirectory });
    }
}
