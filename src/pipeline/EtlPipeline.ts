import { createLogger } from '../utils/Logger.ts';
import { CsvFileExtractor } from '../extractor/CsvFileExtractor.ts';
import { ApiExtractor } from '../extractor/ApiExtractor.ts';
import { SalesTransformer } from '../transformer/SalesTransformer.ts';
import { SalesLoader } from '../db/SalesLoader.ts';
import { formatPreview } from './Preview.ts';
import type { PipelineConfig } from '../config/Config.ts';
import type { EtlRunSummary } from '../model/Models.ts';

const logger = createLogger('EtlPipeline');

/**
 * Stage implementations for one run. Anything left out gets the default.
 */
export interface PipelineDeps {
    csvExtractor?: CsvFileExtractor;
    apiExtractor?: ApiExtractor;
    transformer?: SalesTransformer;
    loader?: SalesLoader;
    /** Where the preview goes; stdout by default */
    print?: (line: string) => void;
}

/**
 * Runs extract (CSV) → extract (API) → transform → load, strictly in
 * sequence. A stage whose input is missing skips and says so. Never throws
 * for source or persistence failures.
 */
export async function runEtlPipeline(
    config: PipelineConfig,
    deps: PipelineDeps = {}
): Promise<EtlRunSummary> {
    const csvExtractor = deps.csvExtractor ?? new CsvFileExtractor();
    const apiExtractor = deps.apiExtractor ?? new ApiExtractor();
    const transformer = deps.transformer ?? new SalesTransformer();
    const loader = deps.loader ?? new SalesLoader();
    const print = deps.print ?? ((line: string) => console.log(line));

    logger.info('Starting ETL Pipeline');

    //step one: extract
    const csv = await csvExtractor.extract(config.csvFilePath);
    const api = await apiExtractor.extract(config.apiUrl);

    //step two: transform
    const transform = transformer.transform(csv, api);

    //step three: load
    const load = loader.load(transform, config.databasePath, config.tableName);

    logger.info('ETL Pipeline Finished');

    if (transform.ok) {
        print('Final transformed data (first 5 rows):');
        for (const line of formatPreview(transform.value, 5)) {
            print(line);
        }
        if (load.ok) {
            print(`Open '${config.databasePath}' with any SQLite browser to inspect table '${config.tableName}'.`);
        }
    }

    return { csv, api, transform, load };
}
