// ============================================================================
// Runtime fetcher configuration
// ============================================================================

/**
 * Where downloads and extracted runtimes go when neither --destination nor
 * VCRUNTIME_DESTINATION is given
 */
export const DEFAULT_DESTINATION = 'D:\\Microsoft\\Runtimes';

export const DESTINATION_ENV_VAR = 'VCRUNTIME_DESTINATION';

export const DOWNLOADS_DIRECTORY_NAME = 'Downloads';
export const OUTPUT_DIRECTORY_PREFIX = 'vcruntime_';

/**
 * Versions below this major are only fetched with --include-old-versions.
 * 14 is Visual C++ 2015.
 */
export const CURRENT_MAJOR_VERSION = 14;

/**
 * Installers before this major predate WiX Burn bundles
 */
export const BURN_BUNDLE_MAJOR_VERSION = 11;

/**
 * Visual C++ 2010 keeps its CAB at .\.\.\.\vc_red.cab, out of reach of the
 * 7-Zip member filter
 */
export const UNSUPPORTED_MAJOR_VERSION = 10;

export const TOOL_TIMEOUT_MS = 10 * 60 * 1000;

export const TEMP_DIRECTORY_PREFIX = 'vcruntime-';

export const WIX = {
    url: 'https://github.com/wixtoolset/wix3/releases/download/wix3111rtm/wix311-binaries.zip',
    archiveName: '__wix.zip',
    directoryName: '__wix',
    darkExecutable: 'dark.exe',
} as const;

export const SEVEN_ZIP = {
    standaloneUrl: 'https://7-zip.org/a/7zr.exe',
    standaloneName: '__7zr.exe',
    extraUrl: 'https://7-zip.org/a/7z2301-extra.7z',
    extraName: '7z2301-extra.7z',
    directoryName: '__7z',
    consoleExecutable: '7za.exe',
} as const;

export const EXPAND_EXECUTABLE = 'expand.exe';

/**
 * Resolves the destination directory: explicit flag, then environment, then default
 */
export function resolveDestination(
    flag: string | undefined,
    env: NodeJS.ProcessEnv = process.env,
): string {
    if (flag) {
        return flag;
    }
    const fromEnv = env[DESTINATION_ENV_VAR];
    return fromEnv ? fromEnv : DEFAULT_DESTINATION;
}
