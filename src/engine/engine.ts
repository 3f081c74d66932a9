import type { QueryResultTable, SqlClient } from '../dialect/client.js';
import type { SemanticManifestLookup } from '../manifest/lookup.js';
import { DataflowPlanBuilder } from '../plan/builder.js';
import type { DataflowPlan } from '../plan/nodes.js';
import { DataflowToSqlConverter } from '../plan/to-sql.js';
import type { SqlStatement } from '../render/sql-plan-renderer.js';
import { engineLogger } from '../utils/logger.js';
import type { QueryRequest } from './request.js';

export interface MetricEngineOptions {
  semanticManifestLookup: SemanticManifestLookup;
  sqlClient: SqlClient;
}

export interface ExplainResult {
  queryRequest: QueryRequest;
  dataflowPlan: DataflowPlan;
  sqlStatement: SqlStatement;
}

export interface QueryResult extends ExplainResult {
  resultTable: QueryResultTable;
}

/**
 * Resolves metric queries against a semantic manifest. SQL is rendered with
 * the client's dialect; only `query` needs a working connection.
 */
export class MetricEngine {
  readonly semanticManifestLookup: SemanticManifestLookup;
  readonly sqlClient: SqlClient;

  constructor(options: MetricEngineOptions) {
    this.semanticManifestLookup = options.semanticManifestLookup;
    this.sqlClient = options.sqlClient;
  }

  explain(queryRequest: QueryRequest): ExplainResult {
    const startTime = Date.now();
    const dataflowPlan = new DataflowPlanBuilder(this.semanticManifestLookup).buildPlan(queryRequest);
    const select = new DataflowToSqlConverter().convert(dataflowPlan);
    const sqlStatement = this.sqlClient.sqlPlanRenderer.render(select);

    engineLogger.info('Explained query', {
      requestId: queryRequest.requestId,
      dialect: this.sqlClient.sqlDialect,
      duration: Date.now() - startTime,
    });
    return { queryRequest, dataflowPlan, sqlStatement };
  }

  async query(queryRequest: QueryRequest): Promise<QueryResult> {
    const explained = this.explain(queryRequest);
    const resultTable = await this.sqlClient.query(explained.sqlStatement.withoutDescriptions.sql);
    return { ...explained, resultTable };
  }
}
