/**
 * Instrument codes and strategy attribution ids.
 *
 * A persisted `sid` is only ever produced by formatSid(), so a lot can't carry
 * an empty or placeholder owner.
 */

import { Attribution } from '../types';
import { ValidationError } from './errors';

export const MANUAL_SID = 'MANUAL';
export const REBALANCE_PREFIX = 'REB_';

/** Owner values written by older versions of the bot that carry no attribution. */
export const PLACEHOLDER_SIDS: ReadonlySet<string> = new Set(['', 'UNKNOWN', 'ORPHAN', 'NONE', 'NULL', 'UNDEFINED']);

const CODE_PATTERN = /^\d{6}$/;
const REBALANCE_PATTERN = /^REB_(\d{8})$/;

export function isValidCode(code: string): boolean {
    return CODE_PATTERN.test(code);
}

/**
 * Broker and legacy rows use "A005930", "5930" or " 005930 ". Returns "" when no digits remain.
 */
export function normalizeCode(raw: unknown): string {
    let text = String(raw ?? '').trim();
    if (text.startsWith('A')) {
        text = text.slice(1);
    }
    const digits = text.replace(/\D/g, '');
    if (!digits) {
        return '';
    }
    return digits.slice(-6).padStart(6, '0');
}

export function isPlaceholderSid(value: string | null | undefined): boolean {
    if (value === null || value === undefined) {
        return true;
    }
    return PLACEHOLDER_SIDS.has(value.trim().toUpperCase());
}

/**
 * @throws ValidationError for an empty or placeholder id
 */
export function strategyAttribution(id: string): Attribution {
    const text = id.trim();
    if (isPlaceholderSid(text)) {
        throw new ValidationError(`strategy id "${id}" is empty or a placeholder`, [`strategy_id=${id}`]);
    }
    return { kind: 'strategy', id: text };
}

export function rebalanceAttribution(date: string): Attribution {
    return { kind: 'rebalance', date };
}

export const MANUAL_ATTRIBUTION: Attribution = { kind: 'manual' };

export function formatSid(attribution: Attribution): string {
    switch (attribution.kind) {
        case 'strategy':
            return attribution.id;
        case 'rebalance':
            return `${REBALANCE_PREFIX}${attribution.date}`;
        case 'manual':
            return MANUAL_SID;
    }
}

/**
 * Inverse of formatSid(). Returns null for placeholders.
 */
export function parseSid(value: string | null | undefined): Attribution | null {
    if (isPlaceholderSid(value) || value === null || value === undefined) {
        return null;
    }
    const text = value.trim();
    if (text.toUpperCase() === MANUAL_SID) {
        return MANUAL_ATTRIBUTION;
    }
    const rebalance = REBALANCE_PATTERN.exec(text);
    if (rebalance) {
        return rebalanceAttribution(rebalance[1]);
    }
    return strategyAttribution(text);
}

export function lotKey(code: string, sid: string): string {
    return `${code}:${sid}`;
}
