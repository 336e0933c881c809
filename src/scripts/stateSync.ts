/**
 * Sync the working copy (STATE_DIR) with the snapshot namespace.
 *
 *   node dist/src/scripts/stateSync.js pull   restore the latest snapshot into STATE_DIR
 *   node dist/src/scripts/stateSync.js push   persist STATE_DIR (conflict-checked)
 *
 * Exit codes: 0 ok / no changes, 1 error, 2 usage, 3 conflict.
 */

import dotenv from 'dotenv';
import { StateConfig, loadStateConfig } from '../config/stateConfig';
import { ConflictError, errorMessage } from '../state/errors';
import { createSnapshotBackend } from '../snapshot/createBackend';
import { SnapshotTransport } from '../snapshot/transport';
import { collectWorkingCopy, commitWorkingCopy, materializeWorkingCopy } from '../snapshot/workingCopy';
import logger from '../utils/logger';

const EXIT_ERROR = 1;
const EXIT_USAGE = 2;
const EXIT_CONFLICT = 3;

function buildTransport(config: StateConfig): SnapshotTransport {
    return new SnapshotTransport(createSnapshotBackend(config), {
        diagnosticsRetention: config.diagnosticsRetention,
        runId: config.runId,
        commitSha: config.commitSha,
    });
}

async function pull(config: StateConfig): Promise<void> {
    const restored = await buildTransport(config).restore();
    await materializeWorkingCopy(restored, config.stateDir);
}

async function push(config: StateConfig): Promise<void> {
    const bundle = await collectWorkingCopy(config.stateDir);
    const result = await commitWorkingCopy(buildTransport(config), config.stateDir, bundle);
    if (result.status === 'unchanged') {
        logger.info('[SNAPSHOT] No changes to commit');
    }
}

async function main(): Promise<void> {
    const command = process.argv[2];
    if (command !== 'pull' && command !== 'push') {
        logger.error(`[SNAPSHOT] usage: stateSync <pull|push> (got "${command ?? ''}")`);
        process.exitCode = EXIT_USAGE;
        return;
    }

    dotenv.config();
    const config = loadStateConfig();
    if (command === 'pull') {
        await pull(config);
    } else {
        await push(config);
    }
}

main().catch((err: unknown) => {
    logger.error(`[SNAPSHOT] ${process.argv[2] ?? 'sync'} failed: ${errorMessage(err)}`);
    process.exitCode = err instanceof ConflictError ? EXIT_CONFLICT : EXIT_ERROR;
});
