import * as path from 'path';
import { NodeFileSystem, AxiosHttpClient, NodeProcessExecutor, ExtractZipExtractor, IFileSystem } from './interfaces';
import { downloadFile } from './download';
import { fetchSevenZip, fetchWix } from './tools';
import { expandCab, extractBurnBundle, extractLegacyInstaller, findCabs, withTemporaryDirectory, ExtractContext } from './extract';
import {
    defaultCatalog,
    installerFileName,
    isIncluded,
    outputDirectoryName,
    selectExtractionStrategy,
} from './catalog';
import { CancelledError, ExtractionError, PrerequisiteError, isEntryError } from './errors';
import { DOWNLOADS_DIRECTORY_NAME } from './config';
import { EntryResult, ExtractionStrategy, FetchOptions, RuntimeEntry, Toolbox } from './models';

type InstalledTools = {
    wixDirectory: string;
    sevenZip: () => Promise<string>;
}

function createToolbox(options: FetchOptions): Toolbox {
    return {
        fileSystem: options.fileSystem || new NodeFileSystem(),
        httpClient: options.httpClient || new AxiosHttpClient(),
        processExecutor: options.processExecutor || new NodeProcessExecutor(),
        zipExtractor: options.zipExtractor || new ExtractZipExtractor(),
        progressBarFactory: options.progressBarFactory,
        signal: options.signal,
        verbose: options.verbose ?? false,
    };
}

function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}

function hasContent(fileSystem: IFileSystem, directory: string): boolean {
    return fileSystem.isDirectory(directory) && fileSystem.readdirSync(directory).length > 0;
}

/**
 * Unpacks one installer and expands its cabinets into the output directory.
 * The output directory is only created once the cabinets have been found.
 */
async function extractInstaller(
    strategy: Exclude<ExtractionStrategy, 'unsupported'>,
    installer: string,
    outputDirectory: string,
    tools: InstalledTools,
    context: ExtractContext,
): Promise<void> {
    const sevenZip = strategy === 'legacy' ? await tools.sevenZip() : undefined;

    await withTemporaryDirectory(context.fileSystem, async (workDirectory) => {
        let cabs: string[];
        if (sevenZip) {
            cabs = await extractLegacyInstaller(sevenZip, installer, workDirectory, context);
        } else {
            await extractBurnBundle(tools.wixDirectory, installer, workDirectory, context);
            cabs = findCabs(workDirectory, context.fileSystem);
        }

        context.fileSystem.mkdirSync(outputDirectory, { recursive: true });
        for (const cab of cabs) {
            await expandCab(cab, outputDirectory, context);
        }
    });

    if (!hasContent(context.fileSystem, outputDirectory)) {
        throw new ExtractionError(`Expanding the cabinets of ${path.basename(installer)} produced no files.`);
    }
}

/**
 * Downloads and extracts every runtime in the catalog.
 *
 * Download and prerequisite failures end the run. Extraction failures are
 * reported and the run moves on to the next runtime; their output
 * directory is removed so the next run tries again.
 */
export async function fetchAll(options: FetchOptions): Promise<EntryResult[]> {
    const toolbox = createToolbox(options);
    const { fileSystem, httpClient, progressBarFactory, signal } = toolbox;
    const { destination, includeOldVersions = false } = options;
    const catalog: RuntimeEntry[] = options.catalog ?? defaultCatalog();

    const downloadDirectory = path.join(destination, DOWNLOADS_DIRECTORY_NAME);
    if (!fileSystem.isDirectory(downloadDirectory)) {
        throw new PrerequisiteError(`The download directory does not exist: ${downloadDirectory}`);
    }

    throwIfCancelled(signal);
    const wixDirectory = await fetchWix(downloadDirectory, toolbox);

    let sevenZip: Promise<string> | undefined;
    const tools: InstalledTools = {
        wixDirectory,
        sevenZip: () => {
            if (!sevenZip) {
                sevenZip = fetchSevenZip(downloadDirectory, toolbox);
            }
            return sevenZip;
        },
    };
    const context: ExtractContext = {
        fileSystem,
        processExecutor: toolbox.processExecutor,
        verbose: toolbox.verbose,
    };

    const results: EntryResult[] = [];
    for (const entry of catalog) {
        throwIfCancelled(signal);
        const { version } = entry;

        if (!isIncluded(entry, includeOldVersions)) {
            results.push({ version, status: 'filtered' });
            continue;
        }

        const installer = await downloadFile(
            entry.url,
            path.join(downloadDirectory, installerFileName(entry)),
            { fileSystem, httpClient, progressBarFactory, signal },
        );

        const outputDirectory = path.join(destination, outputDirectoryName(version));
        if (hasContent(fileSystem, outputDirectory)) {
            console.log(`Already have ${version}`);
            results.push({ version, status: 'already-extracted', outputDirectory });
            continue;
        }

        const strategy = selectExtractionStrategy(version);
        if (strategy === 'unsupported') {
            console.log('Cannot extract Visual C++ 2010 runtime. Skipping.');
            results.push({ version, status: 'unsupported' });
            continue;
        }

        try {
            await extractInstaller(strategy, installer, outputDirectory, tools, context);
            console.log(`Extracted ${version}`);
            results.push({ version, status: 'extracted', outputDirectory });
        } catch (error) {
            if (!isEntryError(error)) {
                throw error;
            }
            fileSystem.rmSync(outputDirectory);
            console.error(`Failed to extract ${version}: ${error.message}`);
            results.push({ version, status: 'failed', error });
        }
    }

    return results;
}
