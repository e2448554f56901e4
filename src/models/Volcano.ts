import type { CsvRow } from '../utils/csv';
import { distanceFrom, METERS_TO_FEET } from '../utils/distance';
import { UnsupportedUnitError } from '../errors';
import {
  coerceNumericFields,
  findKey,
  textField,
  typedProperties,
  type CoercedField,
  type FieldMap,
  type NumericField,
} from './fields';

type VolcanoNumericField = 'volcanoNumber' | 'lastEruptionYear' | 'latitude' | 'longitude' | 'elevation';

const NUMERIC_FIELDS: readonly NumericField<VolcanoNumericField>[] = [
  { name: 'volcanoNumber', kind: 'integer', aliases: ['VolcanoNumber'] },
  { name: 'lastEruptionYear', kind: 'number', aliases: ['LastEruptionYear', 'LastKnownEruption'] },
  { name: 'latitude', kind: 'number', aliases: ['Latitude', 'Lat'] },
  { name: 'longitude', kind: 'number', aliases: ['Longitude', 'Lon'] },
  { name: 'elevation', kind: 'number', aliases: ['Elevation', 'ElevationMeters'] },
];

const NAME_ALIASES = ['VolcanoName', 'Name'];

/** Name GVP gives to volcanoes without one */
export const UNNAMED_MARKER = 'unnamed';

/**
 * One volcano, built from a CSV row.
 *
 * Known columns are exposed as typed properties; every column, known or
 * not, stays available through `fields` and `getField`. Numeric columns that
 * fail to parse read as null and are listed in `invalidFields`.
 */
export class Volcano {
  readonly fields: FieldMap;
  readonly invalidFields: readonly VolcanoNumericField[];
  private readonly numeric: ReadonlyMap<VolcanoNumericField, CoercedField>;

  constructor(row: CsvRow) {
    const data: CsvRow = { ...row };

    const nameKey = findKey(data, NAME_ALIASES);
    if (nameKey !== undefined && data[nameKey]?.trim().toLowerCase() === UNNAMED_MARKER) {
      const numberKey = findKey(data, ['VolcanoNumber']);
      const rawNumber = numberKey === undefined ? '' : data[numberKey] ?? '';
      data[nameKey] = `Unnamed-${rawNumber}`;
    }

    const coerced = coerceNumericFields(data, NUMERIC_FIELDS);
    this.numeric = coerced.fields;
    this.invalidFields = coerced.invalid;
    this.fields = Object.freeze(data);
  }

  private numberOf(field: VolcanoNumericField): number | null {
    return this.numeric.get(field)?.value ?? null;
  }

  private text(...aliases: string[]): string {
    return textField(this.fields, aliases);
  }

  /** GVP volcano number, the unique identifier */
  get volcanoNumber(): number | null {
    return this.numberOf('volcanoNumber');
  }

  get id(): number | null {
    return this.volcanoNumber;
  }

  get name(): string {
    return this.text(...NAME_ALIASES);
  }

  get volcanoType(): string {
    return this.text('VolcanoType', 'PrimaryVolcanoType');
  }

  get country(): string {
    return this.text('Country');
  }

  get region(): string {
    return this.text('Region');
  }

  get subregion(): string {
    return this.text('Subregion');
  }

  get latitude(): number | null {
    return this.numberOf('latitude');
  }

  get lat(): number | null {
    return this.latitude;
  }

  get longitude(): number | null {
    return this.numberOf('longitude');
  }

  get lon(): number | null {
    return this.longitude;
  }

  /** Elevation in meters */
  get elevation(): number | null {
    return this.numberOf('elevation');
  }

  get elev(): number | null {
    return this.elevation;
  }

  getElevation(units: string = 'm'): number | null {
    const unit = units.toLowerCase();
    if (unit !== 'm' && unit !== 'ft' && unit !== 'feet') {
      throw new UnsupportedUnitError(units);
    }

    const meters = this.elevation;
    if (meters === null) {
      return null;
    }
    return unit === 'm' ? meters : meters * METERS_TO_FEET;
  }

  /** [latitude, longitude, elevation in meters] */
  get origin(): [number | null, number | null, number | null] {
    return [this.latitude, this.longitude, this.elevation];
  }

  get lastEruptionYear(): number | null {
    return this.numberOf('lastEruptionYear');
  }

  get geologicalSummary(): string {
    return this.text('GeologicalSummary');
  }

  get tectonicSetting(): string {
    return this.text('TectonicSetting');
  }

  get geologicEpoch(): string {
    return this.text('GeologicEpoch');
  }

  get evidenceCategory(): string {
    return this.text('EvidenceCategory');
  }

  get majorRockType(): string {
    return this.text('MajorRockType');
  }

  get lastUpdateDate(): string {
    return this.text('LastUpdateDate');
  }

  get remarks(): string {
    return this.text('Remarks');
  }

  getField(name: string): string | undefined {
    return this.fields[name];
  }

  /**
   * Distance in km to a point; Infinity without coordinates
   */
  distanceTo(lat: number, lon: number): number {
    return distanceFrom(this.latitude, this.longitude, lat, lon);
  }

  /**
   * All columns, with the known numeric ones typed
   */
  toProperties(): Record<string, string | number | null> {
    return typedProperties(this.fields, this.numeric);
  }

  toString(): string {
    const elevation = this.elevation;
    const elevationText = elevation ? `${elevation.toFixed(0)}m` : 'Unknown';
    return `Volcano (${this.name}, ${this.country}, ${elevationText})`;
  }
}
