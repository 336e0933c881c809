/**
 * Ledger Replay Tests
 */

import { replayLedger } from '../src/ledger/replay';
import { LedgerEntry } from '../src/types';

function fill(timestamp: string, side: 'BUY' | 'SELL', qty: number, price: number, strategy_id = 'momentum'): LedgerEntry {
    return { timestamp, code: '005930', strategy_id, side, qty, price, meta: {} };
}

describe('replayLedger', () => {
    test('averages buys and realizes pnl on sells', () => {
        const books = replayLedger([
            fill('2024-01-02T00:00:00Z', 'BUY', 10, 70000),
            fill('2024-01-03T00:00:00Z', 'BUY', 10, 72000),
            fill('2024-01-04T00:00:00Z', 'SELL', 5, 75000),
        ]);

        expect(books.get('005930:momentum')).toEqual({
            code: '005930',
            strategy_id: 'momentum',
            qty: 15,
            avg_price: 71000,
            realized_pnl: 20000,
            first_buy_ts: '2024-01-02T00:00:00Z',
        });
    });

    test('applies fills in timestamp order, not append order', () => {
        const books = replayLedger([
            fill('2024-01-04T00:00:00Z', 'SELL', 10, 80000),
            fill('2024-01-02T00:00:00Z', 'BUY', 10, 70000),
        ]);

        expect(books.get('005930:momentum')).toMatchObject({ qty: 0, avg_price: null, realized_pnl: 100000, first_buy_ts: null });
    });

    test('clamps sells without matching history at flat', () => {
        const books = replayLedger([fill('2024-01-02T00:00:00Z', 'SELL', 3, 70000)]);
        expect(books.get('005930:momentum')).toMatchObject({ qty: 0, avg_price: null, realized_pnl: 0 });
    });

    test('keeps strategies apart', () => {
        const books = replayLedger([
            fill('2024-01-02T00:00:00Z', 'BUY', 10, 70000, 'momentum'),
            fill('2024-01-02T00:00:00Z', 'BUY', 4, 71000, 'value'),
        ]);

        expect([...books.keys()]).toEqual(['005930:momentum', '005930:value']);
        expect(books.get('005930:value')?.qty).toBe(4);
    });
});
