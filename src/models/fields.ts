import type { CsvRow } from '../utils/csv';

/**
 * Header lookups and numeric coercion shared by the record models
 */

export type FieldMap = Readonly<Record<string, string>>;

export type NumericKind = 'integer' | 'number';

/**
 * Compare header names ignoring case, underscores and spacing, so that
 * `VolcanoNumber`, `Volcano_Number` and `volcano number` all match.
 */
export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Find the first header in `row` matching one of the aliases
 */
export function findKey(row: CsvRow, aliases: readonly string[]): string | undefined {
  const wanted = new Set(aliases.map(normalizeKey));
  return Object.keys(row).find((key) => wanted.has(normalizeKey(key)));
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseInteger(raw: string | undefined): number | null {
  const value = raw?.trim() ?? '';
  if (!INTEGER_PATTERN.test(value)) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseNumber(raw: string | undefined): number | null {
  const value = raw?.trim() ?? '';
  if (!NUMBER_PATTERN.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export interface NumericField<K extends string> {
  name: K;
  kind: NumericKind;
  aliases: readonly string[];
}

export interface CoercedField {
  /** Header that supplied the value */
  key: string;
  value: number | null;
}

export interface CoercedFields<K extends string> {
  fields: ReadonlyMap<K, CoercedField>;
  /** Fields that had text but did not parse */
  invalid: K[];
}

/**
 * Coerce the known numeric columns of a row. Unparseable text becomes null
 * and is reported in `invalid`; absent columns have no entry.
 */
export function coerceNumericFields<K extends string>(
  row: CsvRow,
  numericFields: readonly NumericField<K>[],
): CoercedFields<K> {
  const fields = new Map<K, CoercedField>();
  const invalid: K[] = [];

  for (const field of numericFields) {
    const key = findKey(row, field.aliases);
    if (key === undefined) {
      continue;
    }
    const raw = row[key] ?? '';
    const value = field.kind === 'integer' ? parseInteger(raw) : parseNumber(raw);

    fields.set(field.name, { key, value });
    if (value === null && raw.trim() !== '') {
      invalid.push(field.name);
    }
  }

  return { fields, invalid };
}

/**
 * Text column lookup by alias, '' when absent
 */
export function textField(row: CsvRow, aliases: readonly string[]): string {
  const key = findKey(row, aliases);
  return key === undefined ? '' : row[key] ?? '';
}

/**
 * Raw map with the coerced numeric columns swapped in, for JSON output
 */
export function typedProperties(
  fields: FieldMap,
  numeric: ReadonlyMap<string, CoercedField>,
): Record<string, string | number | null> {
  const properties: Record<string, string | number | null> = { ...fields };
  for (const { key, value } of numeric.values()) {
    properties[key] = value;
  }
  return properties;
}
