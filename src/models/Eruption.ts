import type { CsvRow } from '../utils/csv';
import { distanceFrom } from '../utils/distance';
import {
  coerceNumericFields,
  textField,
  typedProperties,
  type CoercedField,
  type FieldMap,
  type NumericField,
} from './fields';

type EruptionNumericField =
  | 'volcanoNumber'
  | 'eruptionNumber'
  | 'year'
  | 'startYear'
  | 'endYear'
  | 'latitude'
  | 'longitude'
  | 'vei';

const NUMERIC_FIELDS: readonly NumericField<EruptionNumericField>[] = [
  { name: 'volcanoNumber', kind: 'integer', aliases: ['VolcanoNumber'] },
  { name: 'eruptionNumber', kind: 'integer', aliases: ['EruptionNumber'] },
  { name: 'year', kind: 'number', aliases: ['Year'] },
  { name: 'startYear', kind: 'number', aliases: ['StartYear', 'StartDateYear'] },
  { name: 'endYear', kind: 'number', aliases: ['EndYear', 'EndDateYear'] },
  { name: 'latitude', kind: 'number', aliases: ['Latitude'] },
  { name: 'longitude', kind: 'number', aliases: ['Longitude'] },
  { name: 'vei', kind: 'number', aliases: ['VEI', 'ExplosivityIndexMax'] },
];

/**
 * One eruption, built from a CSV row.
 * The eruption tables vary between releases, so anything beyond the
 * typed columns is read with `getField`.
 */
export class Eruption {
  readonly fields: FieldMap;
  readonly invalidFields: readonly EruptionNumericField[];
  private readonly numeric: ReadonlyMap<EruptionNumericField, CoercedField>;

  constructor(row: CsvRow) {
    const coerced = coerceNumericFields(row, NUMERIC_FIELDS);
    this.numeric = coerced.fields;
    this.invalidFields = coerced.invalid;
    this.fields = Object.freeze({ ...row });
  }

  private numberOf(field: EruptionNumericField): number | null {
    return this.numeric.get(field)?.value ?? null;
  }

  /** Number of the volcano that erupted */
  get volcanoNumber(): number | null {
    return this.numberOf('volcanoNumber');
  }

  get id(): number | null {
    return this.volcanoNumber;
  }

  get volcanoName(): string {
    return textField(this.fields, ['VolcanoName']);
  }

  get eruptionNumber(): number | null {
    return this.numberOf('eruptionNumber');
  }

  get year(): number | null {
    return this.numberOf('year');
  }

  get startYear(): number | null {
    return this.numberOf('startYear');
  }

  get endYear(): number | null {
    return this.numberOf('endYear');
  }

  get latitude(): number | null {
    return this.numberOf('latitude');
  }

  get longitude(): number | null {
    return this.numberOf('longitude');
  }

  /** Volcanic Explosivity Index */
  get vei(): number | null {
    return this.numberOf('vei');
  }

  getField(name: string): string | undefined {
    return this.fields[name];
  }

  distanceTo(lat: number, lon: number): number {
    return distanceFrom(this.latitude, this.longitude, lat, lon);
  }

  toProperties(): Record<string, string | number | null> {
    return typedProperties(this.fields, this.numeric);
  }

  toString(): string {
    return `Eruption (Volcano #${this.volcanoNumber ?? 'Unknown'})`;
  }
}
