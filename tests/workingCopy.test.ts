/**
 * Working Copy Tests — pull / push through plain files
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Ledger } from '../src/ledger/ledger';
import { PositionStore } from '../src/positions/positionStore';
import { strategyAttribution } from '../src/state/codes';
import { SnapshotTransport } from '../src/snapshot/transport';
import {
    BASE_FILE,
    collectWorkingCopy,
    commitWorkingCopy,
    materializeWorkingCopy,
    readWorkingCopy,
    workingCopyPaths,
} from '../src/snapshot/workingCopy';
import { ConflictError, NotFoundError } from '../src/state/errors';
import { MemorySnapshotBackend } from './helpers/memoryBackend';

const NOW = new Date('2024-01-05T01:00:00.000Z');

describe('working copy', () => {
    let dir: string;
    let backend: MemorySnapshotBackend;
    let transport: SnapshotTransport;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'working-copy-'));
        backend = new MemorySnapshotBackend();
        transport = new SnapshotTransport(backend, { now: () => NOW });
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test('pull then push without edits has nothing to commit', async () => {
        await materializeWorkingCopy(await transport.restore(), dir);

        const bundle = await collectWorkingCopy(dir);
        expect(await transport.persist(bundle)).toEqual({ status: 'unchanged', version: null });
    });

    test('edits made through the file-backed classes are pushed', async () => {
        await materializeWorkingCopy(await transport.restore(), dir);
        const paths = workingCopyPaths(dir);

        const { ledger } = await Ledger.open(paths.ledger);
        await ledger.append({ timestamp: '2024-01-05T00:30:00.000Z', code: '005930', strategy_id: 'momentum', side: 'BUY', qty: 10, price: 70000 });
        const store = await PositionStore.load(paths.positions);
        store.applyBuyFill({ code: '005930', attribution: strategyAttribution('momentum'), engine: 'trend', qty: 10, price: 70000, at: NOW });
        await store.save(paths.positions);

        const result = await transport.persist(await collectWorkingCopy(dir));
        expect(result.status).toBe('committed');

        const restored = await transport.restore();
        expect(restored.ledger.map((e) => e.strategy_id)).toEqual(['momentum']);
        expect(Object.keys(restored.positionState.positions)).toEqual(['005930:momentum']);
    });

    test('a push from an outdated pull conflicts', async () => {
        await materializeWorkingCopy(await transport.restore(), dir);

        const other = await transport.restore();
        await transport.persist({ ...other, intentCursor: { offset: 1, last_intent_id: 'x', last_ts: null } });

        const { ledger } = await Ledger.open(workingCopyPaths(dir).ledger);
        await ledger.append({ code: '005930', strategy_id: 'momentum', side: 'BUY', qty: 1, price: 1 });

        await expect(transport.persist(await collectWorkingCopy(dir))).rejects.toBeInstanceOf(ConflictError);
    });

    test('records the base it was pulled at', async () => {
        const restored = await transport.restore();
        await transport.persist({ ...restored, intentCursor: { offset: 1, last_intent_id: 'x', last_ts: null } });
        const latest = await transport.restore();

        await materializeWorkingCopy(latest, dir);

        const base: unknown = JSON.parse(await fs.readFile(path.join(dir, BASE_FILE), 'utf-8'));
        expect(base).toEqual(latest.base);
        expect(latest.base.version).toBe(1);
    });

    test('ignores files outside the state layout', async () => {
        await materializeWorkingCopy(await transport.restore(), dir);
        await fs.writeFile(path.join(dir, 'notes.txt'), 'operator notes');

        const bundle = await collectWorkingCopy(dir);
        expect(await transport.persist(bundle)).toEqual({ status: 'unchanged', version: null });
    });

    test('a deleted position file on a pulled copy is refused, never pushed as empty', async () => {
        const store = new PositionStore();
        store.applyBuyFill({ code: '005930', attribution: strategyAttribution('momentum'), engine: 'trend', qty: 10, price: 70000, at: NOW });
        const empty = await transport.restore();
        await transport.persist({ ...empty, positionState: store.toSnapshot() });

        await materializeWorkingCopy(await transport.restore(), dir);
        await fs.rm(workingCopyPaths(dir).positions);

        await expect(collectWorkingCopy(dir)).rejects.toBeInstanceOf(NotFoundError);
        const restored = await transport.restore();
        expect(restored.base.version).toBe(1);
        expect(Object.keys(restored.positionState.positions)).toEqual(['005930:momentum']);
    });

    test('a deleted ledger on a pulled copy is refused too', async () => {
        const restored = await transport.restore();
        await transport.persist({ ...restored, intentCursor: { offset: 1, last_intent_id: 'x', last_ts: null } });
        await materializeWorkingCopy(await transport.restore(), dir);
        await fs.rm(workingCopyPaths(dir).ledger);

        await expect(collectWorkingCopy(dir)).rejects.toThrow(/ledger\/ledger\.jsonl.*not found/);
    });

    test('commitWorkingCopy rebases the copy onto the committed version', async () => {
        await materializeWorkingCopy(await transport.restore(), dir);
        const { ledger } = await Ledger.open(workingCopyPaths(dir).ledger);
        await ledger.append({ timestamp: '2024-01-05T00:30:00.000Z', code: '005930', strategy_id: 'momentum', side: 'BUY', qty: 10, price: 70000 });

        const result = await commitWorkingCopy(transport, dir, await collectWorkingCopy(dir));
        expect(result.status).toBe('committed');

        const again = await collectWorkingCopy(dir);
        expect(again.base.version).toBe(1);
        expect(transport.hasChanges(again)).toBe(false);
        expect(await transport.persist(again)).toEqual({ status: 'unchanged', version: 1 });
    });

    test('readWorkingCopy is null where nothing was pulled', async () => {
        expect(await readWorkingCopy(dir)).toBeNull();
    });
});
