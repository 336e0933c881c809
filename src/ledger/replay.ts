/**
 * Ledger replay: rebuild per-(code, strategy) holdings and average cost from
 * fill history. Used to cross-check the position store, not to overwrite it:
 * the broker stays authoritative for qty and cost basis.
 */

import BigNumber from 'bignumber.js';
import { LedgerEntry } from '../types';
import { lotKey } from '../state/codes';
import { parseTimestamp } from '../utils/time';

export interface ReplayedHolding {
    code: string;
    strategy_id: string;
    qty: number;
    avg_price: number | null;
    realized_pnl: number;
    first_buy_ts: string | null;
}

interface Accumulator {
    code: string;
    strategy_id: string;
    qty: BigNumber;
    cost: BigNumber;
    realized: BigNumber;
    firstBuyTs: string | null;
}

/**
 * Fills are applied in timestamp order (stable on append order), since the
 * ledger tolerates clock skew between writers.
 */
export function replayLedger(entries: Iterable<LedgerEntry>): Map<string, ReplayedHolding> {
    const ordered = [...entries]
        .map((entry, index) => ({ entry, index, ms: parseTimestamp(entry.timestamp) ?? 0 }))
        .sort((a, b) => a.ms - b.ms || a.index - b.index)
        .map(({ entry }) => entry);

    const books = new Map<string, Accumulator>();

    for (const entry of ordered) {
        const key = lotKey(entry.code, entry.strategy_id);
        let book = books.get(key);
        if (!book) {
            book = {
                code: entry.code,
                strategy_id: entry.strategy_id,
                qty: new BigNumber(0),
                cost: new BigNumber(0),
                realized: new BigNumber(0),
                firstBuyTs: null,
            };
            books.set(key, book);
        }

        if (entry.side === 'BUY') {
            book.qty = book.qty.plus(entry.qty);
            book.cost = book.cost.plus(new BigNumber(entry.price).times(entry.qty));
            book.firstBuyTs = book.firstBuyTs ?? entry.timestamp;
            continue;
        }

        // SELL beyond the replayed qty means history is missing; clamp at flat.
        const sold = BigNumber.min(entry.qty, book.qty);
        if (sold.isZero()) {
            continue;
        }
        const avg = book.cost.div(book.qty);
        const basis = avg.times(sold);
        book.realized = book.realized.plus(new BigNumber(entry.price).times(sold).minus(basis));
        book.qty = book.qty.minus(sold);
        book.cost = book.qty.isZero() ? new BigNumber(0) : book.cost.minus(basis);
        if (book.qty.isZero()) {
            book.firstBuyTs = null;
        }
    }

    const out = new Map<string, ReplayedHolding>();
    for (const [key, book] of books) {
        out.set(key, {
            code: book.code,
            strategy_id: book.strategy_id,
            qty: book.qty.toNumber(),
            avg_price: book.qty.isZero() ? null : book.cost.div(book.qty).decimalPlaces(4).toNumber(),
            realized_pnl: book.realized.decimalPlaces(4).toNumber(),
            first_buy_ts: book.firstBuyTs,
        });
    }
    return out;
}
