export { loadConfig } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export * from './errors.js';
export { SqlDialect, resolveSqlDialect, supportedDialectAliases } from './dialect/sql-dialect.js';
export { DialectOnlySqlClient, SqlPlanRendererRegistry } from './dialect/client.js';
export type { QueryResultTable, SqlClient } from './dialect/client.js';
export { loadSemanticManifestFromSource, STDIN_SOURCE } from './manifest/loader.js';
export { parseSemanticManifest } from './manifest/parser.js';
export { SemanticManifestLookup } from './manifest/lookup.js';
export type { SemanticManifest, SemanticModel, Metric, Measure, Dimension, Entity } from './manifest/schema.js';
export { createQueryRequest } from './engine/request.js';
export type { QueryRequest, QueryRequestInit } from './engine/request.js';
export { MetricEngine } from './engine/engine.js';
export type { ExplainResult, QueryResult } from './engine/engine.js';
export { DataflowPlan } from './plan/nodes.js';
export { SqlStatement, SqlPlanRenderer } from './render/sql-plan-renderer.js';
export { parseCsv, parseOptionalDatetime, parseOptionalLimit, parseWhereConstraint } from './command/normalize.js';
export { buildFastPathEngine } from './command/fast-path.js';
export { formatExplainResult, parseSqlCommandArgs, runSqlCommand } from './command/sql-command.js';
export type { CommandIO, SqlCommandOptions } from './command/sql-command.js';
