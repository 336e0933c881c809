/**
 * Working copy: the restored snapshot laid out as plain files in STATE_DIR, so
 * the bot process (and an operator) work on files while the snapshot namespace
 * stays separate.
 *
 *   pull: restore() → materializeWorkingCopy()
 *   push: collectWorkingCopy() → persist()
 *
 * `.snapshot-base.json` records the version and digest the copy was pulled at,
 * which is what makes a push conflict-checked. A copy based on a version must
 * still hold every state file; a deleted one is reported, never pushed as empty.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { NotFoundError, StateCorruptionError } from '../state/errors';
import { describeIssues } from '../state/schemas';
import { atomicWriteFile, hasErrorCode, listFilesRecursive, readTextIfExists } from '../storage/fileIo';
import logger from '../utils/logger';
import { BLOB_PATHS, StateArtifacts, decodeBlobs, encodeBlobs, isAllowedBlobPath, retainDiagnostics } from './blobs';
import { PersistResult, SnapshotBase, SnapshotBundle, SnapshotTransport } from './transport';

export const BASE_FILE = '.snapshot-base.json';

const REQUIRED_BLOBS: readonly string[] = [BLOB_PATHS.positions, BLOB_PATHS.ledger, BLOB_PATHS.intents, BLOB_PATHS.cursor];

const BaseSchema = z.object({
    version: z.number().int().positive().nullable(),
    contentDigest: z.string().nullable(),
});

export interface WorkingCopyPaths {
    positions: string;
    ledger: string;
    intents: string;
    cursor: string;
    diagnostics: string;
}

export function workingCopyPaths(dir: string): WorkingCopyPaths {
    const at = (blobPath: string): string => path.join(dir, ...blobPath.split('/'));
    return {
        positions: at(BLOB_PATHS.positions),
        ledger: at(BLOB_PATHS.ledger),
        intents: at(BLOB_PATHS.intents),
        cursor: at(BLOB_PATHS.cursor),
        diagnostics: path.join(dir, 'diagnostics'),
    };
}

/**
 * Replace the state files in `dir` with the snapshot. Diagnostics no longer in
 * the snapshot are removed; other files in `dir` are left alone.
 */
export async function materializeWorkingCopy(
    snapshot: StateArtifacts & { base: SnapshotBase },
    dir: string
): Promise<void> {
    // Retention is applied on persist; the copy keeps every restored dump.
    const files = encodeBlobs(snapshot, Number.MAX_SAFE_INTEGER);

    await fs.rm(workingCopyPaths(dir).diagnostics, { recursive: true, force: true });
    for (const [blobPath, content] of files) {
        await atomicWriteFile(path.join(dir, ...blobPath.split('/')), content);
    }
    await atomicWriteFile(path.join(dir, BASE_FILE), `${JSON.stringify(snapshot.base, null, 2)}\n`);

    logger.info(`[SNAPSHOT] working copy written to ${dir} (base version ${snapshot.base.version ?? 'none'})`);
}

async function readBase(dir: string): Promise<SnapshotBase> {
    const basePath = path.join(dir, BASE_FILE);
    const text = await readTextIfExists(basePath);
    if (text === null) {
        logger.warn(`[SNAPSHOT] ${basePath} missing, treating working copy as based on an empty namespace`);
        return { version: null, contentDigest: null };
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new StateCorruptionError(basePath, [`invalid JSON: ${reason}`]);
    }
    const parsed = BaseSchema.safeParse(raw);
    if (!parsed.success) {
        throw new StateCorruptionError(basePath, describeIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * Read the working copy back into a bundle for persist(). Files outside the
 * state layout are ignored with a warning.
 *
 * @throws NotFoundError when a copy based on a version lacks a state file
 */
export async function collectWorkingCopy(dir: string): Promise<SnapshotBundle> {
    const base = await readBase(dir);

    const files = new Map<string, string>();
    let names: string[] = [];
    try {
        names = await listFilesRecursive(dir);
    } catch (err: unknown) {
        if (!hasErrorCode(err, 'ENOENT')) {
            throw err;
        }
        logger.warn(`[SNAPSHOT] working copy ${dir} does not exist`);
    }

    for (const name of names) {
        if (name === BASE_FILE || name === BLOB_PATHS.manifest) {
            continue;
        }
        if (!isAllowedBlobPath(name) || name.includes('.tmp-')) {
            logger.warn(`[SNAPSHOT] ignoring non-state file ${name} in working copy`);
            continue;
        }
        files.set(name, await fs.readFile(path.join(dir, ...name.split('/')), 'utf-8'));
    }

    if (base.version !== null) {
        const absent = REQUIRED_BLOBS.filter((blobPath) => !files.has(blobPath));
        if (absent.length > 0) {
            logger.error(
                `[SNAPSHOT] ${dir} is based on version ${base.version} but lacks ${absent.join(', ')}; ` +
                'restore it with a pull, operator confirmation required'
            );
            throw new NotFoundError(`${absent.map((blobPath) => `${dir}/${blobPath}`).join(', ')} (base version ${base.version})`);
        }
    }

    const { artifacts } = decodeBlobs(files, dir);
    return { ...artifacts, base };
}

/**
 * The working copy in `dir`, or null when nothing was ever pulled there.
 */
export async function readWorkingCopy(dir: string): Promise<SnapshotBundle | null> {
    if ((await readTextIfExists(path.join(dir, BASE_FILE))) === null) {
        return null;
    }
    return collectWorkingCopy(dir);
}

/**
 * persist() the bundle; after a commit the working copy is rewritten so it
 * derives from the version just written.
 */
export async function commitWorkingCopy(
    transport: SnapshotTransport,
    dir: string,
    bundle: SnapshotBundle
): Promise<PersistResult> {
    const result = await transport.persist(bundle);
    if (result.status === 'committed') {
        await materializeWorkingCopy(
            {
                ...bundle,
                diagnostics: retainDiagnostics(bundle.diagnostics, transport.diagnosticsRetention),
                base: { version: result.head.version, contentDigest: result.manifest.content_digest },
            },
            dir
        );
    }
    return result;
}
