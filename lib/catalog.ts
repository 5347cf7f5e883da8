import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import runtimeData from '../data/runtimes.json';
import { CatalogError } from './errors';
import { ExtractionStrategy, RuntimeEntry } from './models';
import {
    BURN_BUNDLE_MAJOR_VERSION,
    CURRENT_MAJOR_VERSION,
    OUTPUT_DIRECTORY_PREFIX,
    UNSUPPORTED_MAJOR_VERSION,
} from './config';

export const RuntimeEntrySchema = z.object({
    version: z.string().regex(/^\d+(\.\d+)*$/, 'Expected a dotted numeric version'),
    url: z.string().url(),
    label: z.string().optional(),
});

export const CatalogSchema = z.array(RuntimeEntrySchema);

/**
 * Validates catalog data and returns its entries in order
 */
export function loadCatalog(data: unknown, source = 'catalog'): RuntimeEntry[] {
    const result = CatalogSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
            .join('\n');
        throw new CatalogError(`Catalog validation failed for ${source}:\n${issues}`);
    }

    const seen = new Set<string>();
    for (const entry of result.data) {
        if (seen.has(entry.version)) {
            throw new CatalogError(`Catalog validation failed for ${source}: duplicate version ${entry.version}`);
        }
        seen.add(entry.version);
    }

    return result.data;
}

/**
 * Reads and validates a catalog JSON file
 */
export function readCatalogFile(filePath: string): RuntimeEntry[] {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new CatalogError(`Cannot read catalog ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new CatalogError(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    return loadCatalog(parsed, filePath);
}

/**
 * The runtimes this tool knows how to fetch
 */
export function defaultCatalog(): RuntimeEntry[] {
    return loadCatalog(runtimeData, 'data/runtimes.json');
}

/**
 * Numeric text before the first '.', e.g. 14 for "14.42.34438.0"
 */
export function majorVersion(version: string): number {
    const major = parseInt(version.split('.')[0], 10);
    if (Number.isNaN(major)) {
        throw new CatalogError(`Not a runtime version: ${version}`);
    }
    return major;
}

/**
 * Drops versions older than Visual C++ 2015 unless asked for them
 */
export function isIncluded(entry: RuntimeEntry, includeOldVersions: boolean): boolean {
    return includeOldVersions || majorVersion(entry.version) >= CURRENT_MAJOR_VERSION;
}

export function filterCatalog(entries: RuntimeEntry[], includeOldVersions: boolean): RuntimeEntry[] {
    return entries.filter(entry => isIncluded(entry, includeOldVersions));
}

/**
 * Local name of a downloaded installer: "<version>_<URL file name>"
 */
export function installerFileName(entry: RuntimeEntry): string {
    const urlPath = new URL(entry.url).pathname;
    return `${entry.version}_${path.posix.basename(urlPath)}`;
}

export function outputDirectoryName(version: string): string {
    return OUTPUT_DIRECTORY_PREFIX + version;
}

export function selectExtractionStrategy(version: string): ExtractionStrategy {
    const major = majorVersion(version);
    if (major === UNSUPPORTED_MAJOR_VERSION) {
        return 'unsupported';
    }
    // Older installers do not use WiX and have no .wixburn section
    if (major < BURN_BUNDLE_MAJOR_VERSION) {
        return 'legacy';
    }
    return 'bundle';
}
