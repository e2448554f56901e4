import { copyFile, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Feature, FeatureCollection, Point } from 'geojson';
import { loadConfig } from '../config';
import { GVPSource } from '../sources/GVPSource';
import {
  assertDatasetId,
  cacheMetadataSchema,
  DATASET_IDS,
  type CacheInfo,
  type CacheMetadata,
  type DatasetFormat,
  type DatasetId,
} from '../types/Dataset';
import { parseCsv, type CsvRow } from '../utils/csv';
import { createLogger } from '../utils/logger';

export interface DatasetCacheOptions {
  /** Directory for payloads and sidecars; defaults to VOLCANOES_CACHE_DIR or ./.volcanoes_cache */
  cacheDir?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  baseUrl?: string;
  /** Preconfigured source; takes precedence over timeout and baseUrl */
  source?: GVPSource;
}

export interface DownloadOptions {
  forceRefresh?: boolean;
}

type GeoJsonProperties = Record<string, string | number>;

const COORDINATE_KEYS = new Set(['latitude', 'longitude', 'lat', 'lon']);

/**
 * Local cache of GVP datasets.
 *
 * Each dataset has at most one payload (`<dataset>.csv`) and one metadata
 * sidecar (`<dataset>.meta.json`). An entry is fresh for as long as both
 * exist and the sidecar validates; there is no expiry, only an explicit
 * refresh or clear.
 *
 * Operations run one at a time. Processes sharing a cache directory
 * race on writes and the last writer wins.
 */
export class DatasetCache {
  readonly cacheDir: string;
  private readonly source: GVPSource;
  private readonly logger = createLogger({ component: 'DatasetCache' });

  constructor(options: DatasetCacheOptions = {}) {
    const needsConfig =
      options.cacheDir === undefined ||
      (options.source === undefined && (options.timeout === undefined || options.baseUrl === undefined));
    const config = needsConfig ? loadConfig() : undefined;

    this.cacheDir = path.resolve(options.cacheDir ?? config?.cacheDir ?? '.volcanoes_cache');
    this.source = options.source ?? new GVPSource({
      timeout: options.timeout ?? config?.timeout,
      baseUrl: options.baseUrl ?? config?.baseUrl,
    });
  }

  getSource(): GVPSource {
    return this.source;
  }

  getCachePath(dataset: string, format: DatasetFormat = 'csv'): string {
    return path.join(this.cacheDir, `${assertDatasetId(dataset)}.${format}`);
  }

  getMetadataPath(dataset: string): string {
    return path.join(this.cacheDir, `${assertDatasetId(dataset)}.meta.json`);
  }

  /**
   * Path to the dataset's CSV, downloading it only when there is no valid
   * cache entry or a refresh is forced.
   */
  async download(dataset: string, options: DownloadOptions = {}): Promise<string> {
    const id = assertDatasetId(dataset);
    const cachePath = this.getCachePath(id, 'csv');

    if (!options.forceRefresh && (await fileExists(cachePath))) {
      const metadata = await this.loadMetadata(id);
      if (metadata) {
        this.logger.info({ dataset: id, downloadTime: metadata.download_time }, 'Using cached data');
        return cachePath;
      }
    }

    this.logger.info({ dataset: id, forceRefresh: options.forceRefresh ?? false }, 'Downloading from GVP web services...');
    const data = await this.source.fetchDataset(id, 'csv');

    await mkdir(this.cacheDir, { recursive: true });
    // Until the new sidecar lands the entry reads as a miss
    await rm(this.getMetadataPath(id), { force: true });
    await writeFile(cachePath, data);
    await this.saveMetadata(id, new Date(), cachePath);

    this.logger.info({ dataset: id, bytes: data.length, cachePath }, 'Downloaded and cached dataset');
    return cachePath;
  }

  /**
   * Copy the dataset's CSV to outputPath, or return the cache path when none is given
   */
  async exportToCsv(dataset: string, outputPath?: string, options: DownloadOptions = {}): Promise<string> {
    const cachePath = await this.download(dataset, options);
    if (!outputPath) {
      return cachePath;
    }

    await mkdir(path.dirname(outputPath), { recursive: true });
    await copyFile(cachePath, outputPath);
    this.logger.info({ dataset, outputPath }, 'Exported dataset to CSV');
    return outputPath;
  }

  /**
   * Convert the dataset's CSV to a GeoJSON FeatureCollection of points.
   * Rows without a numeric latitude and longitude are left out.
   */
  async exportToGeoJson(dataset: string, outputPath?: string, options: DownloadOptions = {}): Promise<string> {
    const target = outputPath ?? this.getCachePath(dataset, 'geojson');
    const csvPath = await this.download(dataset, options);

    const { rows } = parseCsv(await readFile(csvPath, 'utf-8'));
    const features = rows.flatMap((row) => {
      const feature = rowToFeature(row);
      return feature ? [feature] : [];
    });
    const geojson: FeatureCollection<Point, GeoJsonProperties> = { type: 'FeatureCollection', features };

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(geojson, null, 2), 'utf-8');

    this.logger.info({ dataset, count: features.length, outputPath: target }, 'Exported dataset to GeoJSON');
    return target;
  }

  /**
   * Cache status per dataset, read from disk only
   */
  async getCacheInfo(dataset?: string): Promise<Partial<Record<DatasetId, CacheInfo>>> {
    const datasets = dataset === undefined ? DATASET_IDS : [assertDatasetId(dataset)];
    const info: Partial<Record<DatasetId, CacheInfo>> = {};

    for (const id of datasets) {
      const filePath = this.getCachePath(id, 'csv');
      const metadata = await this.loadMetadata(id);

      if (metadata && (await fileExists(filePath))) {
        info[id] = {
          cached: true,
          downloadTime: metadata.download_time,
          fileSize: metadata.file_size,
          filePath,
        };
      } else {
        info[id] = { cached: false, filePath };
      }
    }

    return info;
  }

  /**
   * Remove cached payloads and sidecars. Missing files are ignored.
   */
  async clearCache(dataset?: string): Promise<void> {
    const datasets = dataset === undefined ? DATASET_IDS : [assertDatasetId(dataset)];

    for (const id of datasets) {
      const cachePath = this.getCachePath(id, 'csv');
      const existed = await fileExists(cachePath);

      await rm(cachePath, { force: true });
      await rm(this.getMetadataPath(id), { force: true });
      await rm(this.getCachePath(id, 'geojson'), { force: true });

      if (existed) {
        this.logger.info({ dataset: id }, 'Removed cache');
      }
    }
  }

  private async saveMetadata(dataset: DatasetId, downloadTime: Date, filePath: string): Promise<void> {
    const { size } = await stat(filePath);
    const metadata: CacheMetadata = {
      dataset,
      download_time: downloadTime.toISOString(),
      download_timestamp: downloadTime.getTime() / 1000,
      file_path: path.resolve(filePath),
      file_size: size,
    };

    await writeFile(this.getMetadataPath(dataset), JSON.stringify(metadata, null, 2), 'utf-8');
  }

  /**
   * Sidecar contents, or null when it is absent or unreadable
   */
  private async loadMetadata(dataset: DatasetId): Promise<CacheMetadata | null> {
    const metadataPath = this.getMetadataPath(dataset);
    let text: string;
    try {
      text = await readFile(metadataPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      this.logger.warn({ dataset, err: error }, 'Unreadable cache metadata, treating as not cached');
      return null;
    }

    try {
      const result = cacheMetadataSchema.safeParse(JSON.parse(text));
      if (result.success) {
        return result.data;
      }
      this.logger.warn({ dataset, issues: result.error.issues.length }, 'Invalid cache metadata, treating as not cached');
    } catch (error) {
      this.logger.warn({ dataset, err: error }, 'Corrupt cache metadata, treating as not cached');
    }
    return null;
  }
}

function rowToFeature(row: CsvRow): Feature<Point, GeoJsonProperties> | null {
  const latitude = parseCoordinate(row.Latitude ?? row.latitude);
  const longitude = parseCoordinate(row.Longitude ?? row.longitude);
  if (latitude === null || longitude === null) {
    return null;
  }

  const properties: GeoJsonProperties = {};
  for (const [key, value] of Object.entries(row)) {
    if (!COORDINATE_KEYS.has(key.toLowerCase())) {
      properties[key] = retypeValue(value);
    }
  }

  return {
    type: 'Feature',
    geometry: { type: 'Point', coordinates: [longitude, latitude] },
    properties,
  };
}

function parseCoordinate(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;
const FLOAT_TEXT = /^\s*[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Numbers stay numbers: a value with a decimal point as a float, digits as an integer
 */
export function retypeValue(value: string): string | number {
  if (value.includes('.')) {
    return FLOAT_TEXT.test(value) ? Number(value) : value;
  }
  return INTEGER_TEXT.test(value) ? Number.parseInt(value, 10) : value;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
