import type { CanonicalSaleRecord, SaleSource } from '../model/Models.ts';

type CanonicalColumn = keyof CanonicalSaleRecord;

/**
 * How one source's columns map onto the canonical sale record, plus the
 * constant columns the source does not carry itself.
 *
 * When adding a new source, create a similar mapping pointing at the same
 * canonical columns.
 */
export interface SourceMapping {
    source: SaleSource;
    columns: Record<string, CanonicalColumn>;
    /** Constant columns added to every row (after renaming) */
    constants: Partial<Record<CanonicalColumn, string | number>>;
}

/**
 * Online sales CSV export. Carries no product name.
 */
export const ONLINE_CSV_MAPPING: SourceMapping = {
    source: 'online_csv',
    columns: {
        product_sku: 'product_id',
        quantity_sold: 'quantity',
        sale_date: 'sale_timestamp',
        unit_price_usd: 'price_usd',
    },
    constants: {
        product_name: 'N/A',
    },
};

/**
 * In-store product API. Each product counts as a one-unit sale made today;
 * the date is filled in by the transformer.
 */
export const IN_STORE_API_MAPPING: SourceMapping = {
    source: 'in-store_api',
    columns: {
        id: 'product_id',
        title: 'product_name',
        price: 'price_usd',
    },
    constants: {
        quantity: 1,
    },
};

/**
 * Columns both sources are projected to before they are concatenated.
 * total_sale_value is derived after the merge.
 */
export const COMMON_COLUMNS: CanonicalColumn[] = [
    'source',
    'product_id',
    'product_name',
    'quantity',
    'price_usd',
    'sale_timestamp',
];
