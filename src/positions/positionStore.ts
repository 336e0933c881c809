/**
 * Position Store — current belief about open lots
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * One lot per (code, sid) bucket, keyed `code:sid`.
 *
 * INVARIANTS:
 * 1. Every stored lot has qty > 0; a lot reaching 0 is deleted
 * 2. Every sid comes from an Attribution (strategy id, REB_YYYYMMDD, MANUAL)
 * 3. `memory` is a recovery hint only, never authoritative
 * 4. A corrupt file is backed up and reported, never reset to empty
 *
 * The reconciler and the strategy layer both mutate lots through this class.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { promises as fs } from 'fs';
import BigNumber from 'bignumber.js';
import { Attribution, LotFlags, PositionLot, PositionMemory, PositionStoreSnapshot } from '../types';
import { formatSid, isPlaceholderSid, isValidCode, lotKey } from '../state/codes';
import { decodePositionState, emptyPositionState, encodePositionState } from '../state/codec';
import { StateCorruptionError, ValidationError } from '../state/errors';
import { atomicWriteFile, readTextIfExists } from '../storage/fileIo';
import { marketTimeStamp } from '../utils/time';
import logger from '../utils/logger';

const PRICE_DECIMALS = 4;

export interface OpenLotInput {
    code: string;
    attribution: Attribution;
    engine: string;
    qty: number;
    avgPrice: number;
    at: Date;
    flags?: LotFlags;
}

export interface BuyFillInput {
    code: string;
    attribution: Attribution;
    engine: string;
    qty: number;
    price: number;
    at: Date;
}

export interface SellFillInput {
    code: string;
    sid: string;
    qty: number;
    at: Date;
}

export interface SellFillResult {
    filled: number;
    /** Sold qty no lot of the code could absorb */
    unfilled: number;
    closed: string[];
}

function assertQty(qty: number, field = 'qty'): void {
    if (!Number.isInteger(qty) || qty <= 0) {
        throw new ValidationError(`${field} must be a positive integer`, [`${field}=${qty}`]);
    }
}

function assertPrice(price: number, field = 'price'): void {
    if (!Number.isFinite(price) || price <= 0) {
        throw new ValidationError(`${field} must be a positive number`, [`${field}=${price}`]);
    }
}

function assertCode(code: string): void {
    if (!isValidCode(code)) {
        throw new ValidationError('code must be 6 digits', [`code=${code}`]);
    }
}

/**
 * Attributions built as literals bypass strategyAttribution(), so the sid is checked again here.
 */
function sidFor(attribution: Attribution): string {
    const sid = formatSid(attribution);
    if (isPlaceholderSid(sid)) {
        throw new ValidationError(`sid "${sid}" is empty or a placeholder`, [`sid=${sid}`]);
    }
    return sid;
}

function roundPrice(value: BigNumber): number {
    return value.decimalPlaces(PRICE_DECIMALS).toNumber();
}

export class PositionStore {
    private state: PositionStoreSnapshot;

    constructor(snapshot: PositionStoreSnapshot = emptyPositionState()) {
        this.state = structuredClone(snapshot);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // FILE I/O
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Missing file → empty store (first run). Corrupt file → renamed to
     * `<name>.broken-<stamp>` and StateCorruptionError thrown.
     */
    static async load(filePath: string): Promise<PositionStore> {
        const text = await readTextIfExists(filePath);
        if (text === null) {
            logger.warn(`[POSITIONS] no position file at ${filePath}, starting empty`);
            return new PositionStore();
        }

        try {
            const store = new PositionStore(decodePositionState(text, filePath));
            logger.info(`[POSITIONS] loaded ${store.size} lot(s) from ${filePath}`);
            return store;
        } catch (err: unknown) {
            if (err instanceof StateCorruptionError) {
                const backup = `${filePath}.broken-${marketTimeStamp(new Date())}`;
                await fs.rename(filePath, backup);
                logger.error(`[POSITIONS] ${err.message}; moved to ${backup}, operator confirmation required`);
            }
            throw err;
        }
    }

    async save(filePath: string): Promise<void> {
        await atomicWriteFile(filePath, encodePositionState(this.state));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // QUERIES
    // ═══════════════════════════════════════════════════════════════════════════

    get size(): number {
        return Object.keys(this.state.positions).length;
    }

    get schemaVersion(): number {
        return this.state.schema_version;
    }

    get memory(): Readonly<PositionMemory> {
        return this.state.memory;
    }

    getLot(code: string, sid: string): PositionLot | null {
        const lot = this.state.positions[lotKey(code, sid)];
        return lot ? { ...lot, flags: { ...lot.flags } } : null;
    }

    lots(): PositionLot[] {
        return Object.keys(this.state.positions)
            .sort()
            .map((key) => ({ ...this.state.positions[key], flags: { ...this.state.positions[key].flags } }));
    }

    lotsForCode(code: string): PositionLot[] {
        return this.lots().filter((lot) => lot.code === code);
    }

    lotsForStrategy(sid: string): PositionLot[] {
        return this.lots().filter((lot) => lot.sid === sid);
    }

    /** Codes with at least one lot. */
    codes(): Set<string> {
        return new Set(Object.values(this.state.positions).map((lot) => lot.code));
    }

    totalQty(code: string): number {
        return this.lotsForCode(code).reduce((sum, lot) => sum + lot.qty, 0);
    }

    toSnapshot(): PositionStoreSnapshot {
        return structuredClone(this.state);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MUTATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * New lot from a holding nobody tracked. Replaces nothing.
     */
    openLot(input: OpenLotInput): PositionLot {
        assertCode(input.code);
        assertQty(input.qty);
        assertPrice(input.avgPrice, 'avg_price');

        const sid = sidFor(input.attribution);
        const key = lotKey(input.code, sid);
        if (this.state.positions[key]) {
            throw new ValidationError(`lot ${key} already exists`, [key]);
        }

        const ts = input.at.toISOString();
        const lot: PositionLot = {
            code: input.code,
            sid,
            engine: input.engine,
            qty: input.qty,
            avg_price: input.avgPrice,
            entry_ts: ts,
            high_watermark: input.avgPrice,
            flags: { ...(input.flags ?? {}) },
            last_update_ts: ts,
        };
        this.state.positions[key] = lot;
        return { ...lot, flags: { ...lot.flags } };
    }

    /**
     * Buy fill from the strategy layer: opens the lot or adds to it at the
     * weighted average price.
     */
    applyBuyFill(input: BuyFillInput): PositionLot {
        assertCode(input.code);
        assertQty(input.qty);
        assertPrice(input.price);

        const sid = sidFor(input.attribution);
        const existing = this.state.positions[lotKey(input.code, sid)];
        if (!existing) {
            return this.openLot({
                code: input.code,
                attribution: input.attribution,
                engine: input.engine,
                qty: input.qty,
                avgPrice: input.price,
                at: input.at,
            });
        }

        const qty = existing.qty + input.qty;
        const cost = new BigNumber(existing.avg_price).times(existing.qty).plus(new BigNumber(input.price).times(input.qty));
        existing.avg_price = roundPrice(cost.div(qty));
        existing.qty = qty;
        existing.high_watermark = Math.max(existing.high_watermark, input.price);
        existing.last_update_ts = input.at.toISOString();
        return { ...existing, flags: { ...existing.flags } };
    }

    /**
     * Sell fill: takes from the named lot first, then spills into the code's
     * other lots oldest-first (the account sold shares, whoever owned them).
     */
    applySellFill(input: SellFillInput): SellFillResult {
        assertCode(input.code);
        assertQty(input.qty);

        const ts = input.at.toISOString();
        const own = this.state.positions[lotKey(input.code, input.sid)];
        const others = Object.values(this.state.positions)
            .filter((lot) => lot.code === input.code && lot !== own)
            .sort((a, b) => a.entry_ts.localeCompare(b.entry_ts));
        const order = own ? [own, ...others] : others;

        let remaining = input.qty;
        const closed: string[] = [];
        for (const lot of order) {
            if (remaining <= 0) {
                break;
            }
            const take = Math.min(lot.qty, remaining);
            lot.qty -= take;
            lot.last_update_ts = ts;
            remaining -= take;
            if (lot.qty === 0) {
                delete this.state.positions[lotKey(lot.code, lot.sid)];
                closed.push(lot.sid);
            }
        }

        if (remaining > 0) {
            logger.warn(`[POSITIONS] sell ${input.code} qty=${input.qty} exceeds tracked lots by ${remaining}`);
        }
        return { filled: input.qty - remaining, unfilled: remaining, closed };
    }

    /**
     * Broker-side correction of a lot. qty 0 deletes the lot.
     *
     * @returns true when anything changed
     */
    adjustLot(code: string, sid: string, qty: number, avgPrice: number, at: Date): boolean {
        const key = lotKey(code, sid);
        const lot = this.state.positions[key];
        if (!lot) {
            throw new ValidationError(`lot ${key} does not exist`, [key]);
        }
        if (qty === 0) {
            delete this.state.positions[key];
            return true;
        }
        assertQty(qty);
        assertPrice(avgPrice, 'avg_price');
        if (lot.qty === qty && lot.avg_price === avgPrice) {
            return false;
        }
        lot.qty = qty;
        lot.avg_price = avgPrice;
        lot.last_update_ts = at.toISOString();
        return true;
    }

    /**
     * @returns true when the watermark moved
     */
    updateHighWatermark(code: string, sid: string, price: number, at: Date): boolean {
        assertPrice(price);
        const lot = this.state.positions[lotKey(code, sid)];
        if (!lot || price <= lot.high_watermark) {
            return false;
        }
        lot.high_watermark = price;
        lot.last_update_ts = at.toISOString();
        return true;
    }

    setFlag(code: string, sid: string, name: string, value: boolean | number, at: Date): void {
        const key = lotKey(code, sid);
        const lot = this.state.positions[key];
        if (!lot) {
            throw new ValidationError(`lot ${key} does not exist`, [key]);
        }
        lot.flags[name] = value;
        lot.last_update_ts = at.toISOString();
    }

    removeLot(code: string, sid: string): boolean {
        const key = lotKey(code, sid);
        if (!this.state.positions[key]) {
            return false;
        }
        delete this.state.positions[key];
        return true;
    }

    /**
     * Delete every lot of `code`; returns what was removed.
     */
    removeCode(code: string): PositionLot[] {
        const removed: PositionLot[] = [];
        for (const [key, lot] of Object.entries(this.state.positions)) {
            if (lot.code === code) {
                removed.push(lot);
                delete this.state.positions[key];
            }
        }
        return removed;
    }

    remember(code: string, hint: { price?: number; seenAt?: Date; sid?: string }): void {
        const memory = this.state.memory;
        if (hint.price !== undefined) {
            memory.last_price[code] = hint.price;
        }
        if (hint.seenAt !== undefined) {
            memory.last_seen[code] = hint.seenAt.toISOString();
        }
        if (hint.sid !== undefined) {
            memory.last_strategy_id[code] = hint.sid;
        }
    }

    touch(at: Date): void {
        this.state.updated_at = at.toISOString();
    }
}
