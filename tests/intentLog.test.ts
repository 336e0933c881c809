/**
 * Intent Log + Cursor Tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { IntentLog, dedupeIntents, loadCursor, saveCursor } from '../src/intents/intentLog';
import { initialCursor } from '../src/state/codec';
import { StateCorruptionError, ValidationError } from '../src/state/errors';
import { IntentRecord } from '../src/types';

function intent(id: string, overrides: Partial<IntentRecord> = {}): IntentRecord {
    return {
        intent_id: id,
        ts: '2024-01-05T00:00:00.000Z',
        strategy_id: 'momentum',
        code: '005930',
        side: 'BUY',
        qty_hint: 10,
        rationale: 'breakout',
        ...overrides,
    };
}

describe('IntentLog', () => {
    describe('append', () => {
        test('assigns an id and timestamp when missing', async () => {
            const log = new IntentLog();
            const record = await log.append({ strategy_id: 'momentum', code: '005930', side: 'BUY', qty_hint: 10, rationale: '' });
            expect(record.intent_id).toMatch(/^intent-[0-9a-f-]{36}$/);
            expect(log.size).toBe(1);
        });

        test('rejects a record without attribution', async () => {
            const log = new IntentLog();
            await expect(
                log.append({ strategy_id: '', code: '005930', side: 'BUY', qty_hint: 10, rationale: 'x' })
            ).rejects.toBeInstanceOf(ValidationError);
        });

        test('rejects a negative qty hint', async () => {
            const log = new IntentLog();
            await expect(
                log.append({ strategy_id: 'momentum', code: '005930', side: 'SELL', qty_hint: -1, rationale: 'x' })
            ).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('readSince / advance', () => {
        const records = [intent('a'), intent('b'), intent('c')];

        test('reads everything from the initial cursor', () => {
            const log = new IntentLog(null, records);
            expect([...log.readSince(initialCursor())].map((r) => r.intent_id)).toEqual(['a', 'b', 'c']);
        });

        test('advance moves past exactly the processed record', () => {
            const log = new IntentLog(null, records);
            const cursor = log.advance(initialCursor(), records[0]);

            expect(cursor).toEqual({ offset: 1, last_intent_id: 'a', last_ts: '2024-01-05T00:00:00.000Z' });
            expect([...log.readSince(cursor)].map((r) => r.intent_id)).toEqual(['b', 'c']);
        });

        test('is restartable from the same cursor', () => {
            const log = new IntentLog(null, records);
            const cursor = log.advance(initialCursor(), records[1]);
            const first = [...log.readSince(cursor)];
            const second = [...log.readSince(cursor)];
            expect(first).toEqual(second);
            expect(first.map((r) => r.intent_id)).toEqual(['c']);
        });

        test('last_intent_id wins over a stale offset', () => {
            const log = new IntentLog(null, records);
            const cursor = { offset: 0, last_intent_id: 'b', last_ts: null };
            expect([...log.readSince(cursor)].map((r) => r.intent_id)).toEqual(['c']);
        });

        test('skips repeated intent ids', () => {
            const log = new IntentLog(null, [intent('a'), intent('b'), intent('a'), intent('c')]);
            expect([...log.readSince(initialCursor())].map((r) => r.intent_id)).toEqual(['a', 'b', 'c']);
        });

        test('refuses to advance to a record already behind the cursor', () => {
            const log = new IntentLog(null, records);
            const cursor = log.advance(initialCursor(), records[1]);
            expect(() => log.advance(cursor, records[0])).toThrow(ValidationError);
        });
    });

    test('dedupeIntents keeps the first occurrence', () => {
        const out = dedupeIntents([intent('a', { qty_hint: 1 }), intent('a', { qty_hint: 2 }), intent('b')]);
        expect(out.map((r) => [r.intent_id, r.qty_hint])).toEqual([
            ['a', 1],
            ['b', 10],
        ]);
    });

    describe('files', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await fs.mkdtemp(path.join(os.tmpdir(), 'intents-'));
        });

        afterEach(async () => {
            await fs.rm(dir, { recursive: true, force: true });
        });

        test('appends survive a reopen and invalid lines are skipped', async () => {
            const file = path.join(dir, 'intents.jsonl');
            const log = await IntentLog.open(file);
            await log.append({ intent_id: 'a', ts: '2024-01-05T00:00:00.000Z', strategy_id: 'momentum', code: '005930', side: 'BUY', qty_hint: 10, rationale: 'x' });
            await fs.appendFile(file, 'garbage\n');

            const reopened = await IntentLog.open(file);
            expect(reopened.toArray().map((r) => r.intent_id)).toEqual(['a']);
        });

        test('missing cursor file means offset 0', async () => {
            expect(await loadCursor(path.join(dir, 'cursor.json'))).toEqual(initialCursor());
        });

        test('cursor round-trips through its file', async () => {
            const file = path.join(dir, 'cursor.json');
            const cursor = { offset: 3, last_intent_id: 'c', last_ts: '2024-01-05T00:00:00.000Z' };
            await saveCursor(file, cursor);
            expect(await loadCursor(file)).toEqual(cursor);
        });

        test('a corrupt cursor throws instead of replaying the log', async () => {
            const file = path.join(dir, 'cursor.json');
            await fs.writeFile(file, '{"offset": -4}');
            await expect(loadCursor(file)).rejects.toBeInstanceOf(StateCorruptionError);
        });
    });
});
