/**
 * In-process snapshot backend for tests. Same contract as the fs and supabase
 * backends: numbered immutable versions, HEAD moved only from `expected`.
 */

import { SnapshotBackend } from '../../src/snapshot/backend';
import { assertAllowedBlobPaths } from '../../src/snapshot/blobs';
import { ConflictError, NotFoundError } from '../../src/state/errors';
import { SnapshotHead } from '../../src/types';

export class MemorySnapshotBackend implements SnapshotBackend {
    readonly description = 'memory:test';
    readonly versions = new Map<number, Map<string, string>>();
    head: SnapshotHead | null = null;
    commits = 0;

    async readHead(): Promise<SnapshotHead | null> {
        return this.head ? { ...this.head } : null;
    }

    async readFiles(version: number): Promise<Map<string, string>> {
        const files = this.versions.get(version);
        if (!files) {
            throw new NotFoundError(`snapshot version ${version}`);
        }
        return new Map(files);
    }

    async commit(expected: number | null, files: ReadonlyMap<string, string>): Promise<SnapshotHead> {
        assertAllowedBlobPaths(files.keys());
        const actual = this.head?.version ?? null;
        if (actual !== expected) {
            throw new ConflictError(expected, actual);
        }
        const version = (expected ?? 0) + 1;
        this.versions.set(version, new Map(files));
        this.head = { version, updated_at: new Date().toISOString() };
        this.commits++;
        return { ...this.head };
    }

    /** Overwrite one blob of the HEAD version in place. */
    tamper(blobPath: string, content: string | null): void {
        if (!this.head) {
            throw new Error('nothing committed');
        }
        const files = this.versions.get(this.head.version);
        if (!files) {
            throw new Error(`version ${this.head.version} missing`);
        }
        if (content === null) {
            files.delete(blobPath);
        } else {
            files.set(blobPath, content);
        }
    }
}
