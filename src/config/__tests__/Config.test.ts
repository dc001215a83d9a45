import { describe, test, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../Config.ts';

describe('loadConfig', () => {
    test('falls back to the built-in defaults', () => {
        expect(loadConfig({})).toEqual({
            csvFilePath: 'online_sales.csv',
            apiUrl: 'https://fakestoreapi.com/products',
            databasePath: 'sales_data.db',
            tableName: 'master_sales',
        });
    });

    test('blank variables count as unset', () => {
        expect(loadConfig({ ETL_CSV_FILE_PATH: '   ', ETL_TABLE_NAME: '' })).toEqual(DEFAULT_CONFIG);
    });

    test('applies overrides', () => {
        expect(
            loadConfig({
                ETL_CSV_FILE_PATH: ' data/sales.csv ',
                ETL_API_URL: 'http://localhost:8080/products',
                ETL_DATABASE_PATH: '/tmp/out.db',
                ETL_TABLE_NAME: 'sales_2024',
            })
        ).toEqual({
            csvFilePath: 'data/sales.csv',
            apiUrl: 'http://localhost:8080/products',
            databasePath: '/tmp/out.db',
            tableName: 'sales_2024',
        });
    });

    test('rejects an API url that does not parse', () => {
        expect(() => loadConfig({ ETL_API_URL: 'not a url' })).toThrow('Invalid ETL_API_URL: not a url');
    });

    test('rejects a non-http API url', () => {
        expect(() => loadConfig({ ETL_API_URL: 'ftp://example.com/x' })).toThrow(
            'ETL_API_URL must be http(s): ftp://example.com/x'
        );
    });

    test('rejects table names that are not plain identifiers', () => {
        expect(() => loadConfig({ ETL_TABLE_NAME: 'sales; DROP TABLE x' })).toThrow(
            'Invalid ETL_TABLE_NAME: sales; DROP TABLE x'
        );
    });
});
