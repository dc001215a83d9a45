/**
 * A single row of an in-memory table, keyed by column name
 */
export type Row = Record<string, unknown>;

/**
 * An in-memory table as produced by the extractors.
 * Column order follows the source (CSV header order / first-seen JSON keys).
 */
export interface Table {
    columns: string[];
    rows: Row[];
}

// ── Canonical output model ──

export type SaleSource = 'online_csv' | 'in-store_api';

/**
 * A merged, typed sale record, ready for insertion
 */
export interface CanonicalSaleRecord {
    source: SaleSource;
    product_id: string | null;
    product_name: string | null;
    quantity: number | null;
    price_usd: number | null;
    sale_timestamp: Date | null;
    total_sale_value: number | null;
}

/**
 * Column order of the destination table
 */
export const CANONICAL_COLUMNS = [
    'source',
    'product_id',
    'product_name',
    'quantity',
    'price_usd',
    'sale_timestamp',
    'total_sale_value',
] as const satisfies readonly (keyof CanonicalSaleRecord)[];

// ── Stage results ──

export type FailureKind =
    | 'source-missing'
    | 'source-unreadable'
    | 'source-unreachable'
    | 'upstream-missing'
    | 'persistence-failure';

export interface StageFailure {
    kind: FailureKind;
    message: string;
    cause?: unknown;
}

/**
 * Outcome of one pipeline stage. Failures are values, never thrown across
 * stage boundaries.
 */
export type StageResult<T> =
    | { ok: true; value: T }
    | { ok: false; failure: StageFailure };

export function ok<T>(value: T): StageResult<T> {
    return { ok: true, value };
}

export function fail<T = never>(
    kind: FailureKind,
    message: string,
    cause?: unknown
): StageResult<T> {
    return { ok: false, failure: cause === undefined ? { kind, message } : { kind, message, cause } };
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

export interface LoadResult {
    rowsLoaded: number;
    tableName: string;
}

/**
 * Everything one run produced, stage by stage
 */
export interface EtlRunSummary {
    csv: StageResult<Table>;
    api: StageResult<Table>;
    transform: StageResult<CanonicalSaleRecord[]>;
    load: StageResult<LoadResult>;
}
