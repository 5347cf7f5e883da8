import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * File system abstraction interface for testability
 */
export interface IFileSystem {
    existsSync(path: string): boolean;
    isDirectory(path: string): boolean;
    mkdirSync(path: string, options?: { recursive?: boolean }): void;
    readdirSync(path: string): string[];
    unlinkSync(path: string): void;
    renameSync(oldPath: string, newPath: string): void;
    rmSync(path: string): void;
    makeTempDirectory(prefix: string): string;
    createWriteStream(path: string): NodeJS.WritableStream;
}

/**
 * Default implementation using Node.js fs module
 */
export class NodeFileSystem implements IFileSystem {
    existsSync(path: string): boolean {
        return fs.existsSync(path);
    }

    isDirectory(path: string): boolean {
        try {
            return fs.statSync(path).isDirectory();
        } catch {
            return false;
        }
    }

    mkdirSync(path: string, options?: { recursive?: boolean }): void {
        fs.mkdirSync(path, options);
    }

    readdirSync(path: string): string[] {
        return fs.readdirSync(path);
    }

    unlinkSync(path: string): void {
        fs.unlinkSync(path);
    }

    renameSync(oldPath: string, newPath: string): void {
        fs.renameSync(oldPath, newPath);
    }

    /**
     * Removes a file or directory tree; missing paths are ignored
     */
    rmSync(path: string): void {
        fs.rmSync(path, { recursive: true, force: true });
    }

    makeTempDirectory(prefix: string): string {
        return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
    }

    createWriteStream(path: string): NodeJS.WritableStream {
        return fs.createWriteStream(path);
    }
}
