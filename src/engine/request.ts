import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';

const NameListSchema = z.array(z.string().trim().min(1)).nullable().default(null);

export const QueryRequestSchema = z.object({
  metricNames: NameListSchema,
  groupByNames: NameListSchema,
  whereConstraints: z.array(z.string().min(1)).nullable().default(null),
  orderByNames: NameListSchema,
  timeConstraintStart: z.date().nullable().default(null),
  timeConstraintEnd: z.date().nullable().default(null),
  limit: z.number().int().nonnegative().nullable().default(null),
});

export type QueryRequestInit = z.input<typeof QueryRequestSchema>;

export type QueryRequest = Readonly<z.output<typeof QueryRequestSchema>> & {
  /** Correlates log lines for one request; not part of its identity. */
  readonly requestId: string;
};

export function createQueryRequest(init: QueryRequestInit = {}): QueryRequest {
  const parsed = QueryRequestSchema.safeParse(init);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'request';
    throw new InvalidArgumentError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`, field);
  }
  const { timeConstraintStart, timeConstraintEnd } = parsed.data;
  if (timeConstraintStart && timeConstraintEnd && timeConstraintStart > timeConstraintEnd) {
    throw new InvalidArgumentError(
      `The start time (${timeConstraintStart.toISOString()}) is after the end time (${timeConstraintEnd.toISOString()}).`,
      'start-time',
    );
  }
  return Object.freeze({ requestId: `mqr_${uuidv4()}`, ...parsed.data });
}
