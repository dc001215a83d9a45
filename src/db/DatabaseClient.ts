import Database from 'better-sqlite3';
import { createLogger } from '../utils/Logger.ts';
import { CANONICAL_COLUMNS } from '../model/Models.ts';
import type { CanonicalSaleRecord } from '../model/Models.ts';
import type { Logger } from 'pino';

type SqlValue = string | number | null;

const COLUMN_TYPES: Record<(typeof CANONICAL_COLUMNS)[number], string> = {
    source: 'TEXT',
    product_id: 'TEXT',
    product_name: 'TEXT',
    quantity: 'INTEGER',
    price_usd: 'REAL',
    sale_timestamp: 'TEXT',
    total_sale_value: 'REAL',
};

/**
 * Handles all writes to the local SQLite store.
 * One client = one connection; open it for a load and close it right after.
 */
export class DatabaseClient {
    private db: Database.Database;
    private logger: Logger;

    constructor(databasePath: string) {
        this.logger = createLogger('DatabaseClient');
        this.db = new Database(databasePath);
    }

    /**
     * Drops `tableName` if it exists, recreates it with the canonical
     * columns and inserts all records, in one transaction.
     *
     * @returns Number of rows inserted
     */
    replaceTable(tableName: string, records: CanonicalSaleRecord[]): number {
        const table = quoteIdentifier(tableName);
        const columnDefs = CANONICAL_COLUMNS
            .map((c) => `${quoteIdentifier(c)} ${COLUMN_TYPES[c]}`)
            .join(', ');
        const placeholders = CANONICAL_COLUMNS.map(() => '?').join(', ');

        const replace = this.db.transaction((rows: CanonicalSaleRecord[]) => {
            this.db.prepare(`DROP TABLE IF EXISTS ${table}`).run();
            this.db.prepare(`CREATE TABLE ${table} (${columnDefs})`).run();

            const insert = this.db.prepare(
                `INSERT INTO ${table} (${CANONICAL_COLUMNS.map(quoteIdentifier).join(', ')}) VALUES (${placeholders})`
            );
            for (const r of rows) {
                insert.run(...toSqlValues(r));
            }
            return rows.length;
        });

        const count = replace(records);
        this.logger.debug(`Replaced table ${tableName} with ${count} rows`);
        return count;
    }

    /**
     * Reads a table back in insertion order. Used to inspect loads.
     */
    readTable(tableName: string): Record<string, unknown>[] {
        const rows: unknown[] = this.db
            .prepare(`SELECT * FROM ${quoteIdentifier(tableName)} ORDER BY rowid`)
            .all();
        return rows.filter(isRecord);
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

export function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Timestamps are stored as 'YYYY-MM-DD HH:MM:SS' (UTC).
 */
export function formatTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}

function toSqlValues(r: CanonicalSaleRecord): SqlValue[] {
    return [
        r.source,
        r.product_id,
        r.product_name,
        r.quantity,
        r.price_usd,
        r.sale_timestamp ? formatTimestamp(r.sale_timestamp) : null,
        r.total_sale_value,
    ];
}
