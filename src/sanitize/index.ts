import path from 'path';
import { DuplicateColumnError } from '../errors';

export type DuplicateColumnPolicy = 'suffix' | 'fail';

// PostgreSQL truncates longer identifiers (NAMEDATALEN - 1); sanitized names are ASCII.
export const MAX_IDENTIFIER_LENGTH = 63;

const fitIdentifier = (value: string, reserve = 0) =>
  value.slice(0, MAX_IDENTIFIER_LENGTH - reserve).replace(/_+$/, '');

type IdentifierRule = {
  invalid: RegExp;
  lowerFirst: boolean;
  fallback: string;
};

const TABLE_RULE: IdentifierRule = { invalid: /[^a-z0-9_]+/g, lowerFirst: true, fallback: 'table' };
// Column headers are matched case-insensitively and lowered afterwards, so
// non-ASCII letters are replaced rather than folded.
const COLUMN_RULE: IdentifierRule = { invalid: /[^a-zA-Z0-9_]+/g, lowerFirst: false, fallback: 'col' };

const applyRule = (raw: string, rule: IdentifierRule): string => {
  let value = raw.trim();
  if (rule.lowerFirst) value = value.toLowerCase();
  value = value.replace(rule.invalid, '_');
  if (!rule.lowerFirst) value = value.toLowerCase();
  value = value.replace(/_+/g, '_').replace(/^_|_$/g, '');
  if (!value) value = rule.fallback;
  if (/^[0-9]/.test(value)) value = `t_${value}`;
  return fitIdentifier(value);
};

/** Base name of a file path without its extension. */
export const fileStem = (fileName: string): string => {
  const base = path.basename(fileName);
  return base.slice(0, base.length - path.extname(base).length);
};

/**
 * Table name for a file: `"/data/Ventas 2024-Año.csv"` becomes `ventas_2024_a_o`.
 */
export const sanitizeTableName = (fileName: string): string => applyRule(fileStem(fileName), TABLE_RULE);

export const sanitizeColumnName = (header: string): string => applyRule(header, COLUMN_RULE);

/**
 * Sanitizes a header row. With the `suffix` policy a repeated name gets
 * `_2`, `_3`, ... in header order, skipping names already in use; the base is
 * shortened when needed so the suffixed name still fits in 63 characters.
 */
export const sanitizeColumns = (headers: string[], policy: DuplicateColumnPolicy = 'suffix'): string[] => {
  const names = headers.map(sanitizeColumnName);
  const taken = new Set<string>();
  return names.map((name) => {
    if (!taken.has(name)) {
      taken.add(name);
      return name;
    }
    if (policy === 'fail') {
      throw new DuplicateColumnError(
        name,
        headers.filter((_, other) => names[other] === name),
      );
    }
    const withSuffix = (counter: number) => `${fitIdentifier(name, `_${counter}`.length)}_${counter}`;
    let counter = 2;
    while (taken.has(withSuffix(counter))) counter += 1;
    const unique = withSuffix(counter);
    taken.add(unique);
    return unique;
  });
};
