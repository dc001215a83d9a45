import { createLogger } from '../utils/Logger.ts';
import { fail, ok } from '../model/Models.ts';
import type {
    CanonicalSaleRecord,
    Row,
    SaleSource,
    StageResult,
    Table,
} from '../model/Models.ts';
import {
    COMMON_COLUMNS,
    IN_STORE_API_MAPPING,
    ONLINE_CSV_MAPPING,
} from './SourceMappings.ts';
import type { SourceMapping } from './SourceMappings.ts';
import {
    concatTables,
    renameColumns,
    selectColumns,
    withConstantColumn,
} from './TableOps.ts';
import type { Logger } from 'pino';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATE_TIME =
    /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?$/;
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2}|\b(?:GMT|UTC))$/i;

/**
 * Reconciles the online CSV table and the in-store API table into
 * canonical sale records:
 *   rename → add constant columns → project to common columns →
 *   concatenate (CSV rows first) → coerce types → derive total_sale_value
 */
export class SalesTransformer {
    private logger: Logger;
    private now: () => Date;

    /**
     * @param now clock used to date the API rows
     */
    constructor(now: () => Date = () => new Date()) {
        this.logger = createLogger('SalesTransformer');
        this.now = now;
    }

    transform(
        onlineSales: StageResult<Table>,
        apiProducts: StageResult<Table>
    ): StageResult<CanonicalSaleRecord[]> {
        if (!onlineSales.ok || !apiProducts.ok) {
            const message = 'Skipping transformation due to extraction errors.';
            this.logger.warn(message);
            return fail('upstream-missing', message);
        }

        this.logger.info('Starting data transformation...');

        const merged = this.merge(onlineSales.value, apiProducts.value);
        const records = merged.rows.map(toCanonicalRecord);

        this.logger.info(
            `Transformation complete. Final dataset has ${records.length} rows.`
        );
        return ok(records);
    }

    /**
     * Brings both tables to the common column set and concatenates them.
     * Values are still raw at this point.
     */
    merge(onlineSales: Table, apiProducts: Table): Table {
        const online = applyMapping(onlineSales, ONLINE_CSV_MAPPING);
        const inStore = withConstantColumn(
            applyMapping(apiProducts, IN_STORE_API_MAPPING),
            'sale_timestamp',
            formatLocalDate(this.now())
        );

        return concatTables([
            selectColumns(online, COMMON_COLUMNS),
            selectColumns(inStore, COMMON_COLUMNS),
        ]);
    }
}

function applyMapping(table: Table, mapping: SourceMapping): Table {
    let out = renameColumns(table, mapping.columns);
    out = withConstantColumn(out, 'source', mapping.source);
    for (const [column, value] of Object.entries(mapping.constants)) {
        out = withConstantColumn(out, column, value);
    }
    return out;
}

/**
 * Types one merged row and recomputes its total.
 */
export function toCanonicalRecord(row: Row): CanonicalSaleRecord {
    const quantity = toInteger(row.quantity);
    const price = toDecimal(row.price_usd);

    return {
        source: toSaleSource(row.source),
        product_id: toProductId(row.product_id),
        product_name: toText(row.product_name),
        quantity,
        price_usd: price,
        sale_timestamp: toTimestamp(row.sale_timestamp),
        total_sale_value: quantity !== null && price !== null ? quantity * price : null,
    };
}

function toSaleSource(value: unknown): SaleSource {
    if (value === 'online_csv' || value === 'in-store_api') return value;
    throw new Error(`Row without a known source: ${String(value)}`);
}

/**
 * Product ids are always stored as strings, whatever type the source used.
 */
export function toProductId(value: unknown): string | null {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed ? trimmed : null;
    }
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
        return String(value);
    }
    return null;
}

function toText(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return null;
}

export function toDecimal(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    if (!trimmed) return null;
    if (!DECIMAL.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
}

export function toInteger(value: unknown): number | null {
    const parsed = toDecimal(value);
    return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * Timestamps without a zone are wall-clock values and are kept as such in
 * UTC, so `2024-01-01 10:30:00` stays 10:30 whatever the host time zone.
 * Only strings ending in `Z` or an offset are read as instants.
 * Unparseable or impossible dates (e.g. `2024-02-30`) become null.
 */
export function toTimestamp(value: unknown): Date | null {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
    }
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    if (!trimmed) return null;

    if (ZONE_SUFFIX.test(trimmed)) {
        const instant = new Date(trimmed);
        return Number.isNaN(instant.getTime()) ? null : instant;
    }

    const iso = ISO_DATE_TIME.exec(trimmed);
    if (iso) {
        const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = ''] = iso;
        return fromWallClock(
            Number(year),
            Number(month) - 1,
            Number(day),
            Number(hour),
            Number(minute),
            Number(second),
            Number(fraction.padEnd(3, '0'))
        );
    }

    // Other notations (01/02/2024, "Jan 2, 2024") are parsed as local time;
    // read back their local fields as the wall-clock value.
    const local = new Date(trimmed);
    if (Number.isNaN(local.getTime())) return null;
    return fromWallClock(
        local.getFullYear(),
        local.getMonth(),
        local.getDate(),
        local.getHours(),
        local.getMinutes(),
        local.getSeconds(),
        local.getMilliseconds()
    );
}

/**
 * Builds a UTC date from calendar fields, or null when any field is out of
 * range (Date.UTC would roll it over into the next unit).
 */
function fromWallClock(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number,
    millisecond: number
): Date | null {
    const date = new Date(Date.UTC(year, month, day, hour, minute, second, millisecond));
    // Date.UTC maps years 0-99 onto 1900-1999
    date.setUTCFullYear(year);
    const matches =
        date.getUTCFullYear() === year &&
        date.getUTCMonth() === month &&
        date.getUTCDate() === day &&
        date.getUTCHours() === hour &&
        date.getUTCMinutes() === minute &&
        date.getUTCSeconds() === second;
    return matches ? date : null;
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatLocalDate(date: Date): string {
    const year = String(date.getFullYear()).padStart(4, '0');
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}
