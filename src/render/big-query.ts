import { SqlDialect } from '../dialect/sql-dialect.js';
import type { TimeGranularity } from '../manifest/schema.js';
import { SqlPlanRenderer } from './sql-plan-renderer.js';

export class BigQuerySqlPlanRenderer extends SqlPlanRenderer {
  readonly sqlDialect = SqlDialect.BIGQUERY;
  protected readonly doubleType = 'FLOAT64';

  // BigQuery weeks start on Sunday unless asked for ISO weeks
  protected renderDateTrunc(grain: TimeGranularity, arg: string): string {
    return `DATETIME_TRUNC(${arg}, ${grain === 'week' ? 'isoweek' : grain})`;
  }

  protected renderTimestampLiteral(timestamp: string): string {
    return `CAST('${timestamp}' AS DATETIME)`;
  }
}
