import * as path from 'path';
import { downloadFile } from './download';
import { runTool } from './process';
import { ToolError } from './errors';
import { SEVEN_ZIP, WIX } from './config';
import { Toolbox } from './models';

const STAGING_SUFFIX = '.part';

/**
 * Downloads the 7-Zip console executable.
 *
 * This is used to extract runtime packages that predate WiX Burn. The small
 * stand-alone 7zr.exe can only unpack .7z files, so it is used once to unpack
 * the "extra" archive, whose 7za.exe can read the CAB inside the old
 * self-extracting installers.
 *
 * The tools directory counts as installed only when it holds 7za.exe; an
 * incomplete one is unpacked again. Returns the path to 7za.exe.
 */
export async function fetchSevenZip(downloadDirectory: string, toolbox: Toolbox): Promise<string> {
    const { fileSystem, httpClient, processExecutor, progressBarFactory, signal, verbose } = toolbox;
    const downloadOptions = { fileSystem, httpClient, progressBarFactory, signal };

    const standalone = await downloadFile(
        SEVEN_ZIP.standaloneUrl,
        path.join(downloadDirectory, SEVEN_ZIP.standaloneName),
        downloadOptions,
    );
    const toolArchive = await downloadFile(
        SEVEN_ZIP.extraUrl,
        path.join(downloadDirectory, SEVEN_ZIP.extraName),
        downloadOptions,
    );

    const toolsPath = path.join(downloadDirectory, SEVEN_ZIP.directoryName);
    const consoleExecutable = path.join(toolsPath, SEVEN_ZIP.consoleExecutable);
    if (fileSystem.existsSync(consoleExecutable)) {
        return consoleExecutable;
    }

    // Unpack beside the final directory and move it into place only once 7za.exe is there
    const stagingPath = toolsPath + STAGING_SUFFIX;
    fileSystem.rmSync(stagingPath);
    try {
        await runTool(standalone, ['x', toolArchive, '-o' + stagingPath, '-aoa'], { silent: !verbose }, processExecutor);
        if (!fileSystem.existsSync(path.join(stagingPath, SEVEN_ZIP.consoleExecutable))) {
            throw new ToolError(`7-Zip was unpacked but ${SEVEN_ZIP.consoleExecutable} is missing from ${toolArchive}.`);
        }
    } catch (error) {
        fileSystem.rmSync(stagingPath);
        throw error;
    }

    fileSystem.rmSync(toolsPath);
    fileSystem.renameSync(stagingPath, toolsPath);
    return consoleExecutable;
}

/**
 * Downloads the WiX toolset and unpacks it.
 *
 * The zip is extracted on every call; it overwrites the same files.
 * Returns the WiX directory, which holds dark.exe.
 */
export async function fetchWix(downloadDirectory: string, toolbox: Toolbox): Promise<string> {
    const { fileSystem, httpClient, zipExtractor, progressBarFactory, signal } = toolbox;

    const zipPath = await downloadFile(
        WIX.url,
        path.join(downloadDirectory, WIX.archiveName),
        { fileSystem, httpClient, progressBarFactory, signal },
    );

    // extract-zip only takes absolute targets
    const wixDirectory = path.resolve(downloadDirectory, WIX.directoryName);
    await zipExtractor.extract(path.resolve(zipPath), wixDirectory);

    const dark = path.join(wixDirectory, WIX.darkExecutable);
    if (!fileSystem.existsSync(dark)) {
        throw new ToolError(`WiX was unpacked but ${dark} is missing.`);
    }
    return wixDirectory;
}
