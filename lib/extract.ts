import * as path from 'path';
import { IFileSystem } from './interfaces/fs-interface';
import { IProcessExecutor } from './interfaces/process-interface';
import { runTool } from './process';
import { ExtractionError } from './errors';
import { EXPAND_EXECUTABLE, TEMP_DIRECTORY_PREFIX, WIX } from './config';

const CAB_EXTENSION = '.cab';
const BUNDLE_PACKAGES_PATH = ['AttachedContainer', 'packages'];
const BUNDLE_ARCHITECTURE_SUFFIX = '_amd64';
const BUNDLE_CAB_NAME = 'cab1.cab';

export type ExtractContext = {
    fileSystem: IFileSystem;
    processExecutor: IProcessExecutor;
    verbose: boolean;
}

/**
 * Runs `fn` with a fresh temporary directory and removes the directory
 * afterwards, whether `fn` succeeds or throws
 */
export async function withTemporaryDirectory<T>(
    fileSystem: IFileSystem,
    fn: (directory: string) => Promise<T>,
): Promise<T> {
    const directory = fileSystem.makeTempDirectory(TEMP_DIRECTORY_PREFIX);
    try {
        return await fn(directory);
    } finally {
        fileSystem.rmSync(directory);
    }
}

/**
 * Extracts the CAB members of an older self-extracting installer.
 *
 * Returns the paths of the extracted cabinet files.
 */
export async function extractLegacyInstaller(
    sevenZipExecutable: string,
    installer: string,
    outputDirectory: string,
    context: ExtractContext,
): Promise<string[]> {
    await runTool(
        sevenZipExecutable,
        ['x', '-o' + outputDirectory, installer, '-i!*' + CAB_EXTENSION],
        { silent: !context.verbose },
        context.processExecutor,
    );

    const cabs = context.fileSystem.readdirSync(outputDirectory)
        .filter(name => name.toLowerCase().endsWith(CAB_EXTENSION))
        .map(name => path.join(outputDirectory, name));

    if (cabs.length === 0) {
        throw new ExtractionError(`Failed to extract any cabinet file from ${installer}.`);
    }
    return cabs;
}

/**
 * Unpacks a WiX Burn bundle with dark.exe
 */
export async function extractBurnBundle(
    wixDirectory: string,
    bundle: string,
    outputDirectory: string,
    context: ExtractContext,
): Promise<void> {
    const dark = path.join(wixDirectory, WIX.darkExecutable);
    await runTool(
        dark,
        ['-nologo', '-x', outputDirectory, bundle],
        { silent: !context.verbose },
        context.processExecutor,
    );
}

/**
 * Finds the x64 cabinet of each package in an unpacked bundle
 */
export function findCabs(directory: string, fileSystem: IFileSystem): string[] {
    const packagesPath = path.join(directory, ...BUNDLE_PACKAGES_PATH);
    if (!fileSystem.isDirectory(packagesPath)) {
        throw new ExtractionError(`Bundle has no ${BUNDLE_PACKAGES_PATH.join('/')} directory: ${directory}`);
    }

    const cabs: string[] = [];
    for (const name of fileSystem.readdirSync(packagesPath)) {
        if (!name.endsWith(BUNDLE_ARCHITECTURE_SUFFIX)) {
            continue;
        }
        const cab = path.join(packagesPath, name, BUNDLE_CAB_NAME);
        if (!fileSystem.existsSync(cab)) {
            throw new ExtractionError(`Package ${name} has no ${BUNDLE_CAB_NAME}: ${cab}`);
        }
        cabs.push(cab);
    }

    if (cabs.length === 0) {
        throw new ExtractionError(`No ${BUNDLE_ARCHITECTURE_SUFFIX} package found in ${packagesPath}`);
    }
    return cabs;
}

/**
 * Expands every file of a cabinet into the destination directory
 */
export async function expandCab(cab: string, destination: string, context: ExtractContext): Promise<void> {
    await runTool(
        EXPAND_EXECUTABLE,
        ['-F:*', cab, destination],
        { silent: !context.verbose },
        context.processExecutor,
    );
}
