import { createLogger } from '../utils/Logger.ts';
import { describeError, fail, ok } from '../model/Models.ts';
import type { Row, StageResult, Table } from '../model/Models.ts';
import type { Logger } from 'pino';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Extracts the in-store product list from a JSON API with a single GET.
 * No pagination, no retries: one attempt, and any failure means no data.
 */
export class ApiExtractor {
    private logger: Logger;
    private fetchFn: FetchFn;

    constructor(fetchFn: FetchFn = (input, init) => fetch(input, init)) {
        this.logger = createLogger('ApiExtractor');
        this.fetchFn = fetchFn;
    }

    async extract(url: string): Promise<StageResult<Table>> {
        this.logger.info(`Fetching data from API: ${url}...`);

        let body: unknown;
        try {
            const response = await this.fetchFn(url, {
                method: 'GET',
                headers: {
                    'Accept': 'application/json'
                },
                redirect: 'follow'
            });

            if (!response.ok) {
                const message = `API request failed: ${response.status} ${response.statusText}`.trim();
                this.logger.error(message);
                return fail('source-unreachable', message);
            }

            body = await response.json();
        } catch (err) {
            const message = `API request failed: ${describeError(err)}`;
            this.logger.error({ err }, message);
            return fail('source-unreachable', message, err);
        }

        const table = toTable(body);
        if (!table) {
            const message = 'Unexpected API response shape: expected a JSON array of objects';
            this.logger.error(message);
            return fail('source-unreachable', message);
        }

        this.logger.info(`Successfully extracted ${table.rows.length} rows from API.`);
        return ok(table);
    }
}

function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns a parsed JSON body into a table. Columns are the object keys in
 * first-seen order. Returns null when the body is not an array of objects.
 */
export function toTable(body: unknown): Table | null {
    if (!Array.isArray(body)) return null;

    const columns: string[] = [];
    const seen = new Set<string>();
    const rows: Row[] = [];

    for (const item of body) {
        if (!isRow(item)) return null;
        for (const key of Object.keys(item)) {
            if (!seen.has(key)) {
                seen.add(key);
                columns.push(key);
            }
        }
        rows.push({ ...item });
    }

    return { columns, rows };
}
