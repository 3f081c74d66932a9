import { DialectOnlySqlClient } from '../dialect/client.js';
import { MetricEngine } from '../engine/engine.js';
import { loadSemanticManifestFromSource } from '../manifest/loader.js';
import { SemanticManifestLookup } from '../manifest/lookup.js';
import { commandLogger } from '../utils/logger.js';

export interface FastPathEngineOptions {
  /** File path, or `-` for stdin. */
  manifestSource: string;
  dialect: string;
  readStdin?: () => Promise<string>;
}

/**
 * Builds an engine that can explain queries without a warehouse connection.
 * Nothing is constructed if the manifest or the dialect is rejected.
 */
export async function buildFastPathEngine(options: FastPathEngineOptions): Promise<MetricEngine> {
  const semanticManifest = await loadSemanticManifestFromSource(options.manifestSource, {
    readStdin: options.readStdin,
    proxyMetricLogLevel: 'error',
  });
  const sqlClient = DialectOnlySqlClient.fromDialectName(options.dialect);
  const semanticManifestLookup = new SemanticManifestLookup(semanticManifest);

  commandLogger.debug('Built fast-path engine', {
    dialect: sqlClient.sqlDialect,
    metrics: semanticManifestLookup.metricNames().length,
  });
  return new MetricEngine({ semanticManifestLookup, sqlClient });
}
