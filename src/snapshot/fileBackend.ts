/**
 * File Snapshot Backend
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * LAYOUT (one namespace):
 *   <root>/HEAD.json                  {version, updated_at}
 *   <root>/versions/00000007/...      immutable blobs of version 7
 *   <root>/staging-<uuid>/...         a commit in progress
 *
 * COMMIT:
 * 1. HEAD must still be `expected`
 * 2. blobs are written into a private staging dir
 * 3. staging dir renamed to versions/<expected+1>; the rename fails if another
 *    writer already claimed that number → ConflictError
 * 4. HEAD replaced by temp-file + rename
 * 5. versions older than the history limit pruned
 *
 * A reader follows HEAD, so it sees the previous version until step 4 lands.
 * A claim left by a crash between 3 and 4 blocks the next commit until it is
 * older than `staleClaimMs`, then it is removed.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { SnapshotHead } from '../types';
import { ConflictError, NotFoundError, StateCorruptionError, ValidationError } from '../state/errors';
import { describeIssues } from '../state/schemas';
import { atomicWriteFile, hasErrorCode, listFilesRecursive, readTextIfExists } from '../storage/fileIo';
import logger from '../utils/logger';
import { SnapshotBackend } from './backend';
import { assertAllowedBlobPaths } from './blobs';

const HEAD_FILE = 'HEAD.json';
const VERSIONS_DIR = 'versions';
const VERSION_DIGITS = 8;

const HeadSchema = z.object({
    version: z.number().int().positive(),
    updated_at: z.string(),
});

export interface FileSnapshotBackendOptions {
    /** Versions kept on disk, HEAD included */
    historyLimit?: number;
    /** Age after which an uncommitted version claim is removed */
    staleClaimMs?: number;
    now?: () => Date;
}

export class FileSnapshotBackend implements SnapshotBackend {
    readonly description: string;
    private readonly root: string;
    private readonly historyLimit: number;
    private readonly staleClaimMs: number;
    private readonly now: () => Date;

    constructor(snapshotDir: string, namespace: string, options: FileSnapshotBackendOptions = {}) {
        this.root = path.join(snapshotDir, namespace);
        this.description = `fs:${this.root}`;
        this.historyLimit = Math.max(1, options.historyLimit ?? 10);
        this.staleClaimMs = options.staleClaimMs ?? 10 * 60 * 1000;
        this.now = options.now ?? (() => new Date());
    }

    private versionDir(version: number): string {
        return path.join(this.root, VERSIONS_DIR, String(version).padStart(VERSION_DIGITS, '0'));
    }

    async readHead(): Promise<SnapshotHead | null> {
        const headPath = path.join(this.root, HEAD_FILE);
        const text = await readTextIfExists(headPath);
        if (text === null) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (err: unknown) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new StateCorruptionError(headPath, [`invalid JSON: ${reason}`]);
        }
        const parsed = HeadSchema.safeParse(raw);
        if (!parsed.success) {
            throw new StateCorruptionError(headPath, describeIssues(parsed.error));
        }
        return parsed.data;
    }

    async readFiles(version: number): Promise<Map<string, string>> {
        const dir = this.versionDir(version);
        let names: string[];
        try {
            names = await listFilesRecursive(dir);
        } catch (err: unknown) {
            if (hasErrorCode(err, 'ENOENT')) {
                throw new NotFoundError(`snapshot version ${version} in ${this.root}`);
            }
            throw err;
        }

        const files = new Map<string, string>();
        for (const name of names) {
            files.set(name, await fs.readFile(path.join(dir, ...name.split('/')), 'utf-8'));
        }
        return files;
    }

    async commit(expected: number | null, files: ReadonlyMap<string, string>): Promise<SnapshotHead> {
        assertAllowedBlobPaths(files.keys());
        if (files.size === 0) {
            throw new ValidationError('refusing to commit an empty snapshot');
        }

        const current = await this.readHead();
        const actual = current?.version ?? null;
        if (actual !== expected) {
            throw new ConflictError(expected, actual);
        }

        const next = (expected ?? 0) + 1;
        const staging = path.join(this.root, `staging-${uuidv4()}`);
        try {
            for (const [blobPath, content] of files) {
                const target = path.join(staging, ...blobPath.split('/'));
                await fs.mkdir(path.dirname(target), { recursive: true });
                await fs.writeFile(target, content, 'utf-8');
            }
            await fs.mkdir(path.join(this.root, VERSIONS_DIR), { recursive: true });
            await this.claim(staging, expected, next);
        } finally {
            await fs.rm(staging, { recursive: true, force: true });
        }

        const head: SnapshotHead = { version: next, updated_at: this.now().toISOString() };
        await atomicWriteFile(path.join(this.root, HEAD_FILE), `${JSON.stringify(head, null, 2)}\n`);
        logger.info(`[SNAPSHOT] ${this.description} HEAD → ${next}`);

        await this.prune(next);
        return head;
    }

    /**
     * Rename the staging dir onto the version number. A non-empty directory
     * already there means another writer won the number.
     */
    private async claim(staging: string, expected: number | null, next: number): Promise<void> {
        const target = this.versionDir(next);
        try {
            await fs.rename(staging, target);
        } catch (err: unknown) {
            if (!hasErrorCode(err, 'EEXIST', 'ENOTEMPTY')) {
                throw err;
            }
            await this.clearStaleClaim(target, expected);
            throw new ConflictError(expected, next);
        }
    }

    private async clearStaleClaim(target: string, expected: number | null): Promise<void> {
        const head = await this.readHead();
        if ((head?.version ?? null) !== expected) {
            return;
        }
        const stat = await fs.stat(target);
        const age = this.now().getTime() - stat.mtimeMs;
        if (age < this.staleClaimMs) {
            return;
        }
        logger.warn(`[SNAPSHOT] removing stale uncommitted claim ${target} (${Math.round(age / 1000)}s old)`);
        await fs.rm(target, { recursive: true, force: true });
    }

    private async prune(headVersion: number): Promise<void> {
        const versionsRoot = path.join(this.root, VERSIONS_DIR);
        const names = await fs.readdir(versionsRoot);
        const oldest = headVersion - this.historyLimit + 1;
        for (const name of names) {
            const version = Number(name);
            if (Number.isInteger(version) && version < oldest) {
                await fs.rm(path.join(versionsRoot, name), { recursive: true, force: true });
            }
        }
    }
}
