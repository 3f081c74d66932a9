import { UnsupportedOperationError } from '../errors.js';
import { ELEMENT_SEPARATOR } from '../manifest/lookup.js';

export type WhereReferenceKind = 'Dimension' | 'TimeDimension' | 'Entity';

export interface WhereReference {
  kind: WhereReferenceKind;
  name: string;
  grain: string | null;
}

export type WhereTemplatePart = string | WhereReference;

// {{ Dimension('listing__country') }}, {{ TimeDimension('metric_time', 'month') }},
// {{ Entity('listing') }}, {{ Dimension('booking__ds').grain('week') }}
const TEMPLATE_CALL =
  /\{\{\s*(Dimension|TimeDimension|Entity)\(\s*['"]([^'"]+)['"]\s*(?:,\s*['"]([^'"]+)['"]\s*)?\)(?:\.grain\(\s*['"]([^'"]+)['"]\s*\))?\s*\}\}/g;

function isReferenceKind(value: string | undefined): value is WhereReferenceKind {
  return value === 'Dimension' || value === 'TimeDimension' || value === 'Entity';
}

/**
 * Splits a where filter template into literal SQL and element references.
 * Text outside `{{ ... }}` is kept verbatim.
 */
export function parseWhereTemplate(template: string): WhereTemplatePart[] {
  const parts: WhereTemplatePart[] = [];
  let cursor = 0;
  for (const match of template.matchAll(TEMPLATE_CALL)) {
    const index = match.index ?? 0;
    const [, kind, name, grainArg, chainedGrain] = match;
    if (!isReferenceKind(kind) || !name) continue;
    if (index > cursor) parts.push(template.slice(cursor, index));
    parts.push({ kind, name: name.trim().toLowerCase(), grain: (chainedGrain ?? grainArg)?.trim().toLowerCase() ?? null });
    cursor = index + match[0].length;
  }
  if (cursor < template.length) parts.push(template.slice(cursor));

  const leftover = parts.find((p): p is string => typeof p === 'string' && p.includes('{{'));
  if (leftover !== undefined) {
    throw new UnsupportedOperationError(
      `Unsupported where filter template in '${template}'. Use Dimension(...), TimeDimension(...) or Entity(...).`,
    );
  }
  return parts;
}

/** Group-by style name for a reference, e.g. `metric_time__month`. */
export function referenceElementName(reference: WhereReference): string {
  return reference.grain ? `${reference.name}${ELEMENT_SEPARATOR}${reference.grain}` : reference.name;
}
