import { describe, test, expect } from 'vitest';
import { formatPreview } from '../Preview.ts';
import type { CanonicalSaleRecord } from '../../model/Models.ts';

const RECORD: CanonicalSaleRecord = {
    source: 'online_csv',
    product_id: 'A1',
    product_name: 'N/A',
    quantity: 2,
    price_usd: 9.99,
    sale_timestamp: new Date('2024-01-01T00:00:00Z'),
    total_sale_value: 2 * 9.99,
};

describe('formatPreview', () => {
    test('says so when there are no records', () => {
        const lines = formatPreview([]);

        expect(lines).toHaveLength(4);
        expect(lines[1]).toBe('  Records: 0 | Showing: 0');
        expect(lines[3]).toBe('  (no records)');
    });

    test('renders one line per record with formatted values', () => {
        const lines = formatPreview([RECORD]);

        expect(lines).toHaveLength(6);
        expect(lines[5].split(/\s+/).filter(Boolean)).toEqual([
            'online_csv',
            'A1',
            'N/A',
            '2',
            '9.99',
            '2024-01-01',
            '19.98',
        ]);
    });

    test('shows at most `limit` records', () => {
        const records = Array.from({ length: 7 }, () => RECORD);

        const lines = formatPreview(records, 5);

        expect(lines[1]).toBe('  Records: 7 | Showing: 5');
        expect(lines).toHaveLength(10);
    });
});
