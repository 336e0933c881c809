/**
 * Code + Sid Normalization Tests
 */

import {
    MANUAL_ATTRIBUTION,
    formatSid,
    isPlaceholderSid,
    isValidCode,
    lotKey,
    normalizeCode,
    parseSid,
    rebalanceAttribution,
    strategyAttribution,
} from '../src/state/codes';
import { ValidationError } from '../src/state/errors';

describe('normalizeCode', () => {
    test('strips the A prefix broker rows carry', () => {
        expect(normalizeCode('A005930')).toBe('005930');
    });

    test('left-pads short codes', () => {
        expect(normalizeCode('5930')).toBe('005930');
        expect(normalizeCode(660)).toBe('000660');
    });

    test('trims whitespace and keeps the last six digits', () => {
        expect(normalizeCode(' 005930 ')).toBe('005930');
        expect(normalizeCode('1005930')).toBe('005930');
    });

    test('returns empty string when no digits remain', () => {
        expect(normalizeCode('ABC')).toBe('');
        expect(normalizeCode(null)).toBe('');
    });
});

describe('isValidCode', () => {
    test('accepts exactly six digits', () => {
        expect(isValidCode('005930')).toBe(true);
        expect(isValidCode('5930')).toBe(false);
        expect(isValidCode('A05930')).toBe(false);
    });
});

describe('sid attribution', () => {
    test('formatSid renders each attribution kind', () => {
        expect(formatSid(strategyAttribution('momentum'))).toBe('momentum');
        expect(formatSid(rebalanceAttribution('20240105'))).toBe('REB_20240105');
        expect(formatSid(MANUAL_ATTRIBUTION)).toBe('MANUAL');
    });

    test('parseSid inverts formatSid', () => {
        expect(parseSid('momentum')).toEqual({ kind: 'strategy', id: 'momentum' });
        expect(parseSid('REB_20240105')).toEqual({ kind: 'rebalance', date: '20240105' });
        expect(parseSid('manual')).toEqual({ kind: 'manual' });
    });

    test('parseSid treats a malformed rebalance id as a strategy id', () => {
        expect(parseSid('REB_2024')).toEqual({ kind: 'strategy', id: 'REB_2024' });
    });

    test('placeholders carry no attribution', () => {
        for (const value of ['', '  ', 'UNKNOWN', 'unknown', 'ORPHAN', 'None', 'NULL', 'undefined']) {
            expect(isPlaceholderSid(value)).toBe(true);
            expect(parseSid(value)).toBeNull();
        }
        expect(parseSid(null)).toBeNull();
        expect(parseSid(undefined)).toBeNull();
        expect(isPlaceholderSid('MANUAL')).toBe(false);
    });

    test('strategyAttribution refuses placeholders and trims the id', () => {
        for (const value of ['', '  ', 'UNKNOWN', 'orphan']) {
            expect(() => strategyAttribution(value)).toThrow(ValidationError);
        }
        expect(strategyAttribution(' momentum ')).toEqual({ kind: 'strategy', id: 'momentum' });
    });

    test('lotKey joins code and sid', () => {
        expect(lotKey('005930', 'momentum')).toBe('005930:momentum');
    });
});
