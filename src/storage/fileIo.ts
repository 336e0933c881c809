/**
 * Durable file primitives.
 *
 * - atomicWriteFile(): temp file + fsync + rename, readers see old or new, never half
 * - appendLineDurable(): append + fsync before returning
 */

import { promises as fs } from 'fs';
import path from 'path';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

export function isMissingFileError(err: unknown): boolean {
    return isErrnoException(err) && err.code === 'ENOENT';
}

export function hasErrorCode(err: unknown, ...codes: string[]): boolean {
    return isErrnoException(err) && err.code !== undefined && codes.includes(err.code);
}

/**
 * File contents, or null when the file doesn't exist.
 */
export async function readTextIfExists(filePath: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf-8');
    } catch (err: unknown) {
        if (isMissingFileError(err)) {
            return null;
        }
        throw err;
    }
}

export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.tmp-${process.pid}`;
    const handle = await fs.open(tmpPath, 'w');
    try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
    } finally {
        await handle.close();
    }
    await fs.rename(tmpPath, filePath);
}

export async function appendLineDurable(filePath: string, line: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const handle = await fs.open(filePath, 'a');
    try {
        await handle.appendFile(`${line}\n`, 'utf-8');
        await handle.sync();
    } finally {
        await handle.close();
    }
}

/**
 * Relative paths (always `/`-separated) of every regular file under `root`.
 */
export async function listFilesRecursive(root: string): Promise<string[]> {
    const out: string[] = [];

    async function walk(dir: string, prefix: string): Promise<void> {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        for (const entry of entries) {
            const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
            if (entry.isDirectory()) {
                await walk(path.join(dir, entry.name), rel);
            } else if (entry.isFile()) {
                out.push(rel);
            }
        }
    }

    await walk(root, '');
    return out.sort();
}
