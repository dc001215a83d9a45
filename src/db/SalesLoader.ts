import { createLogger } from '../utils/Logger.ts';
import { DatabaseClient } from './DatabaseClient.ts';
import { describeError, fail, ok } from '../model/Models.ts';
import type { CanonicalSaleRecord, LoadResult, StageResult } from '../model/Models.ts';
import type { Logger } from 'pino';

export type OpenDatabase = (databasePath: string) => DatabaseClient;

/**
 * Persists the merged sale records, fully replacing the destination table.
 * The connection lives only for the duration of one load.
 */
export class SalesLoader {
    private logger: Logger;
    private openDatabase: OpenDatabase;

    constructor(openDatabase: OpenDatabase = (path) => new DatabaseClient(path)) {
        this.logger = createLogger('SalesLoader');
        this.openDatabase = openDatabase;
    }

    load(
        records: StageResult<CanonicalSaleRecord[]>,
        databasePath: string,
        tableName: string
    ): StageResult<LoadResult> {
        if (!records.ok) {
            const message = 'No data to load. Skipping.';
            this.logger.warn(message);
            return fail('upstream-missing', message);
        }

        this.logger.info(`Connecting to database '${databasePath}'...`);

        let db: DatabaseClient | undefined;
        try {
            db = this.openDatabase(databasePath);
            const rowsLoaded = db.replaceTable(tableName, records.value);
            this.logger.info(
                `Successfully loaded ${rowsLoaded} rows into table '${tableName}'.`
            );
            return ok({ rowsLoaded, tableName });
        } catch (err) {
            const message = `Failed to load data into database: ${describeError(err)}`;
            this.logger.error({ err }, message);
            return fail('persistence-failure', message, err);
        } finally {
            db?.close();
        }
    }
}
