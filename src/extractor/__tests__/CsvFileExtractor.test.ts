import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CsvFileExtractor } from '../CsvFileExtractor.ts';

describe('CsvFileExtractor', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'sales-etl-csv-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('reads header and rows, keeping extra columns and string cells', async () => {
        const path = join(dir, 'online_sales.csv');
        await writeFile(
            path,
            'product_sku,quantity_sold,sale_date,unit_price_usd,channel\n' +
                'A1,2,2024-01-01,9.99,web\n' +
                'B2,1,2024-01-02,20.00,app\n',
            'utf-8'
        );

        const result = await new CsvFileExtractor().extract(path);

        if (!result.ok) throw new Error('expected a successful extraction');
        expect(result.value.columns).toEqual([
            'product_sku',
            'quantity_sold',
            'sale_date',
            'unit_price_usd',
            'channel',
        ]);
        expect(result.value.rows).toEqual([
            { product_sku: 'A1', quantity_sold: '2', sale_date: '2024-01-01', unit_price_usd: '9.99', channel: 'web' },
            { product_sku: 'B2', quantity_sold: '1', sale_date: '2024-01-02', unit_price_usd: '20.00', channel: 'app' },
        ]);
    });

    test('strips a BOM and surrounding header whitespace, handles CRLF', async () => {
        const path = join(dir, 'bom.csv');
        await writeFile(path, '\uFEFFproduct_sku , quantity_sold\r\nA1,2\r\n', 'utf-8');

        const result = await new CsvFileExtractor().extract(path);

        if (!result.ok) throw new Error('expected a successful extraction');
        expect(result.value.columns).toEqual(['product_sku', 'quantity_sold']);
        expect(result.value.rows).toEqual([{ product_sku: 'A1', quantity_sold: '2' }]);
    });

    test('a header-only file gives zero rows', async () => {
        const path = join(dir, 'empty.csv');
        await writeFile(path, 'product_sku,quantity_sold,sale_date,unit_price_usd\n', 'utf-8');

        const result = await new CsvFileExtractor().extract(path);

        if (!result.ok) throw new Error('expected a successful extraction');
        expect(result.value.rows).toHaveLength(0);
    });

    test('a missing file is reported as source-missing, not thrown', async () => {
        const path = join(dir, 'does-not-exist.csv');

        const result = await new CsvFileExtractor().extract(path);

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.failure.kind).toBe('source-missing');
            expect(result.failure.message).toBe(`CSV file not found at ${path}`);
        }
    });

    test('a path that cannot be read as a file is source-unreadable', async () => {
        const path = join(dir, 'a-directory');
        await mkdir(path);

        const result = await new CsvFileExtractor().extract(path);

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.failure.kind).toBe('source-unreadable');
    });
});
