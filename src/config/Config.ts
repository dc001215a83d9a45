/**
 * Locations of the two sources and the destination table for one run.
 * Passed explicitly into the pipeline so tests can point it anywhere.
 */
export type PipelineConfig = Readonly<{
    csvFilePath: string;
    apiUrl: string;
    databasePath: string;
    tableName: string;
}>;

export const DEFAULT_CONFIG: PipelineConfig = {
    csvFilePath: 'online_sales.csv',
    // API for "in-store" product data
    apiUrl: 'https://fakestoreapi.com/products',
    databasePath: 'sales_data.db',
    tableName: 'master_sales',
};

type EnvSource = Record<string, string | undefined>;

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function optionalString(env: EnvSource, key: string): string | undefined {
    const value = env[key];
    if (value == null) return undefined;
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
}

function parseApiUrl(value: string): string {
    let url: URL;
    try {
        url = new URL(value);
    } catch {
        throw new Error(`Invalid ETL_API_URL: ${value}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new Error(`ETL_API_URL must be http(s): ${value}`);
    }
    return url.toString();
}

function parseTableName(value: string): string {
    if (!TABLE_NAME_PATTERN.test(value)) {
        throw new Error(`Invalid ETL_TABLE_NAME: ${value}`);
    }
    return value;
}

/**
 * Builds the run configuration. Every setting has a default; the ETL_*
 * variables only override them.
 */
export function loadConfig(env: EnvSource = process.env): PipelineConfig {
    const apiUrl = optionalString(env, 'ETL_API_URL');
    const tableName = optionalString(env, 'ETL_TABLE_NAME');

    return {
        csvFilePath: optionalString(env, 'ETL_CSV_FILE_PATH') ?? DEFAULT_CONFIG.csvFilePath,
        apiUrl: apiUrl ? parseApiUrl(apiUrl) : DEFAULT_CONFIG.apiUrl,
        databasePath: optionalString(env, 'ETL_DATABASE_PATH') ?? DEFAULT_CONFIG.databasePath,
        tableName: tableName ? parseTableName(tableName) : DEFAULT_CONFIG.tableName,
    };
}
