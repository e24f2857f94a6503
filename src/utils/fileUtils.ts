import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { glob } from 'fast-glob';

/**
 * Read raw file bytes
 */
export async function readFileBytes(filePath: string): Promise<Buffer> {
    return await fs.readFile(filePath);
}

/**
 * Write content to file
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Check if directory exists
 */
export async function dirExists(dirPath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(dirPath);
        return stat.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Find files matching patterns
 */
export async function findFiles(
    directory: string,
    patterns: string | string[],
    options: { ignore?: string[]; absolute?: boolean } = {}
): Promise<string[]> {
    const { ignore = [], absolute = true } = options;

    return await glob(patterns, {
        cwd: directory,
        ignore,
        absolute,
        onlyFiles: true,
    });
}

/**
 * Read at most `maxChars` characters from the start of a text file
 */
export async function readHead(filePath: string, maxChars: number): Promise<string> {
    const handle = await fs.open(filePath, 'r');
    try {
        // UTF-8 needs at most 4 bytes per character
        const buffer = Buffer.alloc(maxChars * 4);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
        return buffer.subarray(0, bytesRead).toString('utf-8').slice(0, maxChars);
    } finally {
        await handle.close();
    }
}

/**
 * Create a fresh temporary directory
 */
export async function makeTempDir(prefix: string, parent: string = os.tmpdir()): Promise<string> {
    await fs.mkdir(parent, { recursive: true });
    return await fs.mkdtemp(path.join(parent, prefix));
}

/**
 * Remove directory recursively
 */
export async function removeDir(dirPath: string): Promise<void> {
    await fs.rm(dirPath, { recursive: true, force: true });
}

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references in a user-supplied path
 */
export function expandUserPath(input: string): string {
    let expanded = input.replace(/\$\{(\w+)\}|\$(\w+)/g, (match, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare ?? '';
        const value = process.env[name];
        return value !== undefined ? value : match;
    });

    if (expanded === '~' || expanded.startsWith('~/') || expanded.startsWith('~\\')) {
        expanded = path.join(os.homedir(), expanded.slice(1));
    }

    return expanded;
}

/**
 * Ensure a path uses forward slashes (for cross-platform consistency in reports)
 */
export function toUnixPath(filePath: string): string {
    return filePath.split(path.sep).join('/');
}
