/**
 * Market-local time helpers. The account trades on KRX, so bucket dates and
 * dump names are stamped in Asia/Seoul regardless of the host time zone.
 */

export const MARKET_TIME_ZONE = 'Asia/Seoul';

const dateParts = new Intl.DateTimeFormat('en-CA', {
    timeZone: MARKET_TIME_ZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
});

function partsOf(date: Date): Record<string, string> {
    const parts: Record<string, string> = {};
    for (const part of dateParts.formatToParts(date)) {
        parts[part.type] = part.value;
    }
    return parts;
}

/** YYYYMMDD in market time. */
export function marketDateStamp(date: Date): string {
    const p = partsOf(date);
    return `${p.year}${p.month}${p.day}`;
}

/** YYYYMMDD_HHMMSS in market time. */
export function marketTimeStamp(date: Date): string {
    const p = partsOf(date);
    return `${p.year}${p.month}${p.day}_${p.hour}${p.minute}${p.second}`;
}

/** Epoch millis of an ISO timestamp, or null when it doesn't parse. */
export function parseTimestamp(value: string): number | null {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
}
