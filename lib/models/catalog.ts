/**
 * A known Visual C++ Redistributable build and where to get it
 */
export type RuntimeEntry = {
    /** Dotted numeric version, e.g. "14.42.34438.0" */
    version: string;

    /** Download URL of the x64 installer */
    url: string;

    /** Human name such as "Visual C++ 2008" */
    label?: string;
}

/**
 * How an installer is unpacked, decided by its major version
 */
export type ExtractionStrategy = 'legacy' | 'bundle' | 'unsupported';
