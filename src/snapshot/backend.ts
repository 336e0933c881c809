/**
 * Snapshot storage backend.
 *
 * A namespace holds numbered, immutable versions and one HEAD pointer. commit()
 * is the only writer; it must move HEAD from `expected` to `expected + 1` or
 * fail with ConflictError, and a reader must never see a half-written version.
 */

import { SnapshotHead } from '../types';

export interface SnapshotBackend {
    /** Shown in logs */
    readonly description: string;

    /** null when nothing was ever committed to the namespace */
    readHead(): Promise<SnapshotHead | null>;

    /**
     * @throws NotFoundError when the version is not stored
     */
    readFiles(version: number): Promise<Map<string, string>>;

    /**
     * Store `files` as version `(expected ?? 0) + 1` and point HEAD at it.
     *
     * @throws ConflictError when HEAD is no longer `expected`
     */
    commit(expected: number | null, files: ReadonlyMap<string, string>): Promise<SnapshotHead>;
}
