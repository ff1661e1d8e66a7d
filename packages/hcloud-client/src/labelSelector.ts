/**
 * Label selector expressions, as accepted by every `list` endpoint:
 *
 * - `'value'`          → `key=value`
 * - `{ not: 'value' }` → `key!=value`
 * - `['a', 'b']`       → `key in (a,b)`
 * - `{ notIn: [...] }` → `key notin (a,b)`
 * - `true`             → `key` (label present)
 * - `false`            → `!key` (label absent)
 *
 * A plain string is passed through unchanged.
 */
export type LabelExpression =
  | string
  | boolean
  | readonly string[]
  | { not: string }
  | { notIn: readonly string[] };

export type LabelSelector = string | Record<string, LabelExpression>;

function formatExpression(key: string, expression: LabelExpression): string {
  if (typeof expression === 'string') {
    return `${key}=${expression}`;
  }
  if (typeof expression === 'boolean') {
    return expression ? key : `!${key}`;
  }
  if (isStringList(expression)) {
    return `${key} in (${expression.join(',')})`;
  }
  if ('not' in expression) {
    return `${key}!=${expression.not}`;
  }
  return `${key} notin (${expression.notIn.join(',')})`;
}

function isStringList(value: LabelExpression): value is readonly string[] {
  return Array.isArray(value);
}

export function formatLabelSelector(selector: LabelSelector | undefined): string | undefined {
  if (selector === undefined) {
    return undefined;
  }
  if (typeof selector === 'string') {
    const trimmed = selector.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  const expressions = Object.entries(selector).map(([key, expression]) => formatExpression(key, expression));
  return expressions.length > 0 ? expressions.join(',') : undefined;
}
