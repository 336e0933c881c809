/**
 * In-process stand-in for the PostgREST endpoint behind a Supabase client.
 *
 * Covers what the snapshot backend sends: select with eq filters, insert with
 * primary-key checks (23505 on a duplicate), update / delete with eq and lt
 * filters, `select=` projections and maybeSingle() in both Accept styles.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';

export type Row = Record<string, unknown>;

const PRIMARY_KEYS: Record<string, string[]> = {
    state_snapshots: ['namespace', 'version'],
    state_heads: ['namespace'],
};

const SINGLE_OBJECT = 'application/vnd.pgrst.object+json';

function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function json(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function matches(row: Row, filters: Array<[string, string]>): boolean {
    return filters.every(([column, expression]) => {
        const dot = expression.indexOf('.');
        const op = expression.slice(0, dot);
        const value = expression.slice(dot + 1);
        switch (op) {
            case 'eq':
                return String(row[column]) === value;
            case 'lt':
                return Number(row[column]) < Number(value);
            default:
                throw new Error(`unsupported filter ${op}`);
        }
    });
}

function project(row: Row, select: string | null): Row {
    if (select === null || select === '*') {
        return { ...row };
    }
    const out: Row = {};
    for (const column of select.split(',').map((name) => name.trim())) {
        out[column] = row[column];
    }
    return out;
}

export class FakePostgrest {
    private readonly tables = new Map<string, Row[]>();
    /** Every request answers 500 while set */
    failing = false;
    readonly requests: string[] = [];

    table(name: string): Row[] {
        let rows = this.tables.get(name);
        if (!rows) {
            rows = [];
            this.tables.set(name, rows);
        }
        return rows;
    }

    client(): SupabaseClient {
        return createClient('http://supabase.test', 'test-key', {
            auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
            global: { fetch: this.fetch },
        });
    }

    readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
        const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
        const method = init?.method ?? 'GET';
        const headers = new Headers(init?.headers);
        const tableName = url.pathname.split('/').pop() ?? '';
        this.requests.push(`${method} ${tableName}`);

        if (this.failing) {
            return json(500, { code: 'XX000', message: 'database unavailable', details: null, hint: null });
        }

        const select = url.searchParams.get('select');
        const filters = [...url.searchParams.entries()].filter(([key]) => key !== 'select' && key !== 'columns');
        const rows = this.table(tableName);
        const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : null;

        switch (method) {
            case 'GET': {
                const found = rows.filter((row) => matches(row, filters)).map((row) => project(row, select));
                if (headers.get('Accept') === SINGLE_OBJECT) {
                    return found.length === 1
                        ? json(200, found[0])
                        : json(406, { code: 'PGRST116', message: 'JSON object requested', details: `The result contains ${found.length} rows`, hint: null });
                }
                return json(200, found);
            }
            case 'POST': {
                const inserted = Array.isArray(body) ? body.filter(isRow) : isRow(body) ? [body] : [];
                const keys = PRIMARY_KEYS[tableName] ?? [];
                for (const row of inserted) {
                    const duplicate = rows.some((existing) => keys.every((key) => existing[key] === row[key]));
                    if (duplicate) {
                        return json(409, { code: '23505', message: `duplicate key value violates unique constraint "${tableName}_pkey"`, details: null, hint: null });
                    }
                }
                rows.push(...inserted.map((row) => ({ ...row })));
                return new Response(null, { status: 201 });
            }
            case 'PATCH': {
                const changes = isRow(body) ? body : {};
                const updated = rows.filter((row) => matches(row, filters));
                for (const row of updated) {
                    Object.assign(row, changes);
                }
                if (select !== null) {
                    return json(200, updated.map((row) => project(row, select)));
                }
                return new Response(null, { status: 204 });
            }
            case 'DELETE': {
                const kept = rows.filter((row) => !matches(row, filters));
                rows.splice(0, rows.length, ...kept);
                return new Response(null, { status: 204 });
            }
            default:
                return json(405, { message: `unsupported method ${method}` });
        }
    };
}
