import type { CanonicalSaleRecord } from '../model/Models.ts';

/**
 * Renders the first `limit` records as a fixed-width text table.
 */
export function formatPreview(records: CanonicalSaleRecord[], limit: number = 5): string[] {
    const lines: string[] = [];
    lines.push('═'.repeat(100));
    lines.push(`  Records: ${records.length} | Showing: ${Math.min(limit, records.length)}`);
    lines.push('═'.repeat(100));

    if (records.length === 0) {
        lines.push('  (no records)');
        return lines;
    }

    lines.push(
        `  ${'Source'.padEnd(13)} ${'Product ID'.padEnd(11)} ${'Name'.padEnd(30)} ${'Qty'.padStart(5)} ${'Price'.padStart(9)} ${'Date'.padEnd(11)} ${'Total'.padStart(10)}`
    );
    lines.push('  ' + '─'.repeat(96));

    for (const r of records.slice(0, limit)) {
        const name = truncate(r.product_name ?? 'N/A', 30);
        const qty = r.quantity !== null ? String(r.quantity).padStart(5) : '  N/A';
        const price = r.price_usd !== null ? r.price_usd.toFixed(2).padStart(9) : '      N/A';
        const date = r.sale_timestamp ? r.sale_timestamp.toISOString().slice(0, 10) : 'N/A';
        const total = r.total_sale_value !== null ? r.total_sale_value.toFixed(2).padStart(10) : '       N/A';
        lines.push(
            `  ${r.source.padEnd(13)} ${(r.product_id ?? 'N/A').padEnd(11)} ${name.padEnd(30)} ${qty} ${price} ${date.padEnd(11)} ${total}`
        );
    }

    return lines;
}

function truncate(value: string, width: number): string {
    return value.length > width ? value.slice(0, width - 1) + '…' : value;
}
