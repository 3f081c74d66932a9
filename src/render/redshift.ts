import { SqlDialect } from '../dialect/sql-dialect.js';
import type { TimeGranularity } from '../manifest/schema.js';
import { SqlPlanRenderer } from './sql-plan-renderer.js';

export class RedshiftSqlPlanRenderer extends SqlPlanRenderer {
  readonly sqlDialect = SqlDialect.REDSHIFT;
  protected readonly doubleType = 'DOUBLE PRECISION';

  protected renderDateTrunc(grain: TimeGranularity, arg: string): string {
    return `DATE_TRUNC('${grain}', ${arg})`;
  }

  protected renderTimestampLiteral(timestamp: string): string {
    return `CAST('${timestamp}' AS TIMESTAMP)`;
  }
}
