import { EruptionCollection } from '../collections/EruptionCollection';
import { VolcanoCollection } from '../collections/VolcanoCollection';
import { MissingFileError, ModeError } from '../errors';
import type { Volcano } from '../models/Volcano';
import type { CacheInfo, DatasetId } from '../types/Dataset';
import type { DatabaseDiagnostic, DiagnosticSink } from '../types/Diagnostics';
import { createLogger, type Logger } from '../utils/logger';
import { loadEruptions, loadVolcanoes } from './CsvLoader';
import { DatasetCache, type DatasetCacheOptions } from './DatasetCache';
import { concatEruptions, mergeVolcanoes } from './DatasetMerger';

export type DatabaseMode = 'local' | 'web-services';

/**
 * Independent criteria for filterVolcanoes; every one supplied must match
 */
export interface VolcanoFilter {
  /** Substring of the country, ignoring case */
  country?: string;
  /** Substring of the name, ignoring case */
  name?: string;
  /** Exact volcano number */
  id?: number;
  /** Substring of the volcano type, ignoring case */
  volcanoType?: string;
  /** Substring of the geologic epoch, ignoring case */
  geologicEpoch?: string;
  /** Inclusive lower bound in meters */
  minElevation?: number;
  /** Inclusive upper bound in meters */
  maxElevation?: number;
  /** Reference point; results are sorted nearest first when both are given */
  latitude?: number;
  longitude?: number;
  /** Inclusive radius around the reference point */
  radiusKm?: number;
}

export interface DatabaseStats {
  totalVolcanoes: number;
  countries: number;
  volcanoTypes: number;
  dataSource: string;
}

export interface DatabaseOptions extends DatasetCacheOptions {
  /** Shared cache manager; built from the remaining options when omitted */
  cache?: DatasetCache;
  onDiagnostic?: DiagnosticSink;
}

export interface LocalDatabaseOptions extends DatabaseOptions {
  /** CSV to load; defaults to the cached holocene_volcanoes dataset */
  csvPath?: string;
}

export interface EpochSelection {
  holocene?: boolean;
  pleistocene?: boolean;
}

const containsIgnoringCase = (haystack: string, needle: string): boolean =>
  haystack.toLowerCase().includes(needle.toLowerCase());

/**
 * Apply a VolcanoFilter to a collection
 */
export function filterVolcanoes(volcanoes: VolcanoCollection, criteria: VolcanoFilter = {}): VolcanoCollection {
  const { country, name, id, volcanoType, geologicEpoch, minElevation, maxElevation } = criteria;
  const checkElevation = minElevation !== undefined || maxElevation !== undefined;

  let filtered = volcanoes.filter((v) => {
    if (country && !containsIgnoringCase(v.country, country)) return false;
    if (name && !containsIgnoringCase(v.name, name)) return false;
    if (id !== undefined && v.volcanoNumber !== id) return false;
    if (volcanoType && !containsIgnoringCase(v.volcanoType, volcanoType)) return false;
    if (geologicEpoch && !containsIgnoringCase(v.geologicEpoch, geologicEpoch)) return false;

    if (checkElevation) {
      const elevation = v.elevation;
      if (elevation === null) return false;
      if (minElevation !== undefined && elevation < minElevation) return false;
      if (maxElevation !== undefined && elevation > maxElevation) return false;
    }

    return true;
  });

  const { latitude, longitude, radiusKm } = criteria;
  if (latitude !== undefined && longitude !== undefined) {
    if (radiusKm !== undefined) {
      filtered = filtered.withinRadius(latitude, longitude, radiusKm);
    }
    filtered = filtered.sortByDistance(latitude, longitude);
  }

  return filtered;
}

/**
 * Query surface shared by both database modes.
 *
 * Use `LocalVolcanoDatabase.open` for a database loaded eagerly from a CSV
 * file, or `new WebServicesVolcanoDatabase()` for one that downloads
 * datasets only when asked.
 */
export abstract class VolcanoDatabase {
  abstract readonly mode: DatabaseMode;
  readonly cache: DatasetCache;
  protected readonly logger: Logger;
  private readonly onDiagnostic?: DiagnosticSink;

  protected constructor(options: DatabaseOptions, component: string) {
    this.cache = options.cache ?? new DatasetCache(options);
    this.onDiagnostic = options.onDiagnostic;
    this.logger = createLogger({ component });
  }

  /** The volcanoes queries run against */
  abstract get volcanoes(): VolcanoCollection;

  /** Where the current volcanoes came from */
  protected abstract get dataSource(): string;

  filterVolcanoes(criteria: VolcanoFilter = {}): VolcanoCollection {
    return filterVolcanoes(this.volcanoes, criteria);
  }

  getVolcanoById(volcanoId: number): Volcano | undefined {
    return this.filterVolcanoes({ id: volcanoId }).at(0);
  }

  /** Distinct non-empty countries, sorted */
  getCountries(): string[] {
    return distinctSorted(this.volcanoes.map((v) => v.country));
  }

  /** Distinct non-empty volcano types, sorted */
  getVolcanoTypes(): string[] {
    return distinctSorted(this.volcanoes.map((v) => v.volcanoType));
  }

  stats(): DatabaseStats {
    return {
      totalVolcanoes: this.volcanoes.length,
      countries: this.getCountries().length,
      volcanoTypes: this.getVolcanoTypes().length,
      dataSource: this.dataSource,
    };
  }

  getCacheInfo(dataset?: string): Promise<Partial<Record<DatasetId, CacheInfo>>> {
    return this.cache.getCacheInfo(dataset);
  }

  clearCache(dataset?: string): Promise<void> {
    return this.cache.clearCache(dataset);
  }

  /**
   * @throws ModeError unless this database is in web-services mode
   */
  asWebServices(): WebServicesVolcanoDatabase {
    if (this instanceof WebServicesVolcanoDatabase) {
      return this;
    }
    throw new ModeError('web-services', this.mode);
  }

  /**
   * @throws ModeError unless this database was loaded from a local file
   */
  asLocal(): LocalVolcanoDatabase {
    if (this instanceof LocalVolcanoDatabase) {
      return this;
    }
    throw new ModeError('local', this.mode);
  }

  protected report(diagnostic: DatabaseDiagnostic): void {
    this.logger.warn({ kind: diagnostic.kind }, diagnostic.message);
    this.onDiagnostic?.(diagnostic);
  }
}

/**
 * Database loaded once, at open time, from a CSV file.
 *
 * Without an explicit path it loads the cached holocene_volcanoes dataset,
 * downloading it first if nothing is cached. A missing file leaves the
 * database empty and reports a `missing-file` diagnostic.
 */
export class LocalVolcanoDatabase extends VolcanoDatabase {
  readonly mode = 'local';
  private collection: VolcanoCollection = VolcanoCollection.empty();
  private csvPath = '';

  private constructor(options: LocalDatabaseOptions) {
    super(options, 'LocalVolcanoDatabase');
  }

  static async open(options: LocalDatabaseOptions = {}): Promise<LocalVolcanoDatabase> {
    const database = new LocalVolcanoDatabase(options);
    await database.load(options.csvPath);
    return database;
  }

  get volcanoes(): VolcanoCollection {
    return this.collection;
  }

  protected get dataSource(): string {
    return this.csvPath;
  }

  private async load(csvPath?: string): Promise<void> {
    this.csvPath = csvPath ?? (await this.cache.download('holocene_volcanoes'));

    try {
      this.collection = await loadVolcanoes(this.csvPath, { onDiagnostic: (d) => this.report(d) });
    } catch (error) {
      if (!(error instanceof MissingFileError)) {
        throw error;
      }
      this.collection = VolcanoCollection.empty();
      this.report({ kind: 'missing-file', message: error.message, path: error.path });
    }
  }
}

/**
 * Database backed by GVP web services. Nothing is fetched until
 * getVolcanoes or getEruptions is called; each call reloads from the
 * dataset cache and becomes the data later queries run against.
 */
export class WebServicesVolcanoDatabase extends VolcanoDatabase {
  readonly mode = 'web-services';
  private latestVolcanoes: VolcanoCollection = VolcanoCollection.empty();
  private latestEruptions: EruptionCollection = EruptionCollection.empty();
  private sources: DatasetId[] = [];

  constructor(options: DatabaseOptions = {}) {
    super(options, 'WebServicesVolcanoDatabase');
  }

  get volcanoes(): VolcanoCollection {
    return this.latestVolcanoes;
  }

  /** Eruptions from the latest getEruptions call */
  get eruptions(): EruptionCollection {
    return this.latestEruptions;
  }

  protected get dataSource(): string {
    return this.sources.length > 0 ? this.sources.join(', ') : 'GVP web services (nothing loaded)';
  }

  /**
   * Holocene volcanoes by default. With both epochs, Pleistocene records
   * already present in the Holocene set are dropped and reported.
   */
  async getVolcanoes(selection: EpochSelection = {}): Promise<VolcanoCollection> {
    const { holocene = true, pleistocene = false } = selection;
    let result = VolcanoCollection.empty();

    if (holocene && pleistocene) {
      const holoceneSet = await this.loadVolcanoDataset('holocene_volcanoes');
      const pleistoceneSet = await this.loadVolcanoDataset('pleistocene_volcanoes');
      const merged = mergeVolcanoes(holoceneSet, pleistoceneSet);
      if (merged.warning) {
        this.report(merged.warning);
      }
      result = merged.volcanoes;
      this.sources = ['holocene_volcanoes', 'pleistocene_volcanoes'];
    } else if (holocene || pleistocene) {
      const dataset: DatasetId = holocene ? 'holocene_volcanoes' : 'pleistocene_volcanoes';
      result = await this.loadVolcanoDataset(dataset);
      this.sources = [dataset];
    } else {
      this.sources = [];
    }

    this.latestVolcanoes = result;
    return result;
  }

  /**
   * Holocene eruptions by default; both epochs are concatenated as-is
   */
  async getEruptions(selection: EpochSelection = {}): Promise<EruptionCollection> {
    const { holocene = true, pleistocene = false } = selection;
    const datasets: DatasetId[] = [];
    if (holocene) datasets.push('holocene_eruptions');
    if (pleistocene) datasets.push('pleistocene_eruptions');

    let result = EruptionCollection.empty();
    for (const dataset of datasets) {
      const csvPath = await this.cache.download(dataset);
      const eruptions = await loadEruptions(csvPath, { onDiagnostic: (d) => this.report(d) });
      result = concatEruptions(result, eruptions);
    }

    this.latestEruptions = result;
    return result;
  }

  private async loadVolcanoDataset(dataset: DatasetId): Promise<VolcanoCollection> {
    const csvPath = await this.cache.download(dataset);
    return loadVolcanoes(csvPath, { onDiagnostic: (d) => this.report(d) });
  }
}

function distinctSorted(values: string[]): string[] {
  return [...new Set(values.filter((value) => value !== ''))].sort();
}
