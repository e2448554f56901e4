import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { FeatureCollection, Point } from 'geojson';
import type { FieldMap } from '../models/fields';
import { formatCsv } from '../utils/csv';
import { createLogger } from '../utils/logger';

/**
 * What a collection needs from the records it holds
 */
export interface CatalogRecord {
  readonly fields: FieldMap;
  readonly latitude: number | null;
  readonly longitude: number | null;
  toProperties(): Record<string, string | number | null>;
}

export type RecordProperties = Record<string, string | number | null>;

const logger = createLogger({ component: 'RecordCollection' });

/**
 * Ordered, immutable sequence of records.
 *
 * Every transform returns a new collection of the same concrete type that
 * shares the record instances; the collection itself is never mutated.
 */
export abstract class RecordCollection<T extends CatalogRecord, Self extends RecordCollection<T, Self>>
  implements Iterable<T>
{
  protected readonly items: readonly T[];

  constructor(items: readonly T[]) {
    this.items = Object.freeze([...items]);
  }

  /**
   * Build a collection of the concrete type around new items
   */
  protected abstract derive(items: readonly T[]): Self;

  /** Label used in log lines and summaries */
  protected abstract readonly recordLabel: string;

  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Record at index; negative indexes count back from the end
   */
  at(index: number): T | undefined {
    return this.items.at(index);
  }

  slice(start?: number, end?: number): Self {
    return this.derive(this.items.slice(start, end));
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  toArray(): T[] {
    return [...this.items];
  }

  filter(predicate: (record: T, index: number) => boolean): Self {
    return this.derive(this.items.filter(predicate));
  }

  /**
   * Stable sort into a new collection
   */
  sort(compare: (a: T, b: T) => number): Self {
    return this.derive([...this.items].sort(compare));
  }

  concat(other: Iterable<T>): Self {
    return this.derive([...this.items, ...other]);
  }

  map<R>(fn: (record: T, index: number) => R): R[] {
    return this.items.map(fn);
  }

  /**
   * Write the records as CSV. The header is the field set of the first
   * record; an empty collection writes an empty file.
   */
  async exportToCsv(outputPath: string): Promise<string> {
    const first = this.items[0];
    const header = first ? Object.keys(first.fields) : [];

    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, formatCsv(header, this.items.map((record) => record.fields)), 'utf-8');

    logger.info({ count: this.items.length, outputPath }, `Exported ${this.recordLabel} to CSV`);
    return outputPath;
  }

  /**
   * Records with coordinates as a GeoJSON FeatureCollection of points
   */
  toGeoJson(): FeatureCollection<Point, RecordProperties> {
    const features: FeatureCollection<Point, RecordProperties>['features'] = [];

    for (const record of this.items) {
      const { latitude, longitude } = record;
      if (latitude === null || longitude === null) {
        continue;
      }
      features.push({
        type: 'Feature',
        geometry: { type: 'Point', coordinates: [longitude, latitude] },
        properties: record.toProperties(),
      });
    }

    return { type: 'FeatureCollection', features };
  }

  async exportToGeoJson(outputPath: string): Promise<string> {
    const geojson = this.toGeoJson();

    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(geojson, null, 2), 'utf-8');

    logger.info({ count: geojson.features.length, outputPath }, `Exported ${this.recordLabel} to GeoJSON`);
    return outputPath;
  }
}

/**
 * Numeric comparison that treats equal infinities as equal
 */
export function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
