import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';

import { createLogger } from '../utils/Logger.ts';
import { describeError, fail, ok } from '../model/Models.ts';
import type { Row, StageResult, Table } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Extracts the online sales export (delimited text with a header row)
 * into an in-memory table. Cells are kept as strings; typing happens in
 * the transformer.
 */
export class CsvFileExtractor {
    private logger: Logger;

    constructor() {
        this.logger = createLogger('CsvFileExtractor');
    }

    async extract(filePath: string): Promise<StageResult<Table>> {
        this.logger.info(`Reading data from ${filePath}...`);

        let text: string;
        try {
            text = await readFile(filePath, 'utf-8');
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT') {
                const message = `CSV file not found at ${filePath}`;
                this.logger.error(message);
                return fail('source-missing', message, err);
            }
            const message = `Failed to read CSV file ${filePath}: ${describeError(err)}`;
            this.logger.error({ err }, message);
            return fail('source-unreadable', message, err);
        }

        const table = this.parse(text);
        this.logger.info(`Successfully extracted ${table.rows.length} rows from CSV.`);
        return ok(table);
    }

    /**
     * Parses CSV text into a table. The delimiter is auto-detected.
     */
    parse(text: string): Table {
        // Strip BOM if present
        const cleaned = text.replace(/^\uFEFF/, '');

        const parsed = Papa.parse<Record<string, string>>(cleaned, {
            header: true,
            skipEmptyLines: true,
            transformHeader: (h) => h.trim(),
        });

        if (parsed.errors.length > 0) {
            this.logger.warn(
                { errors: parsed.errors.slice(0, 5) },
                `CSV parser reported ${parsed.errors.length} issue(s)`
            );
        }

        const columns = parsed.meta.fields ?? [];
        const rows: Row[] = parsed.data.map((record) => ({ ...record }));
        return { columns, rows };
    }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
