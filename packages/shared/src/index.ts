export * from './envConfig';
export * from './postgres';
export * from './duckdb';
