/**
 * volcano-catalog
 *
 * Queryable in-memory model of the Smithsonian Global Volcanism Program
 * volcano and eruption datasets, with cached web-service downloads.
 */

export { loadConfig, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, type CatalogConfig } from './config';
export {
  VolcanoCatalogError,
  InvalidDatasetError,
  DownloadFailedError,
  ModeError,
  MalformedRecordError,
  MissingFileError,
  UnsupportedUnitError,
  type VolcanoCatalogErrorCode,
} from './errors';

export { Volcano, UNNAMED_MARKER } from './models/Volcano';
export { Eruption } from './models/Eruption';
export type { FieldMap } from './models/fields';

export { RecordCollection, type CatalogRecord, type RecordProperties } from './collections/RecordCollection';
export { VolcanoCollection, type VolcanoSummaryStats } from './collections/VolcanoCollection';
export { EruptionCollection, type EruptionSummaryStats } from './collections/EruptionCollection';

export { GVPSource, repairPayload, type GVPSourceConfig, type GVPSourceStats } from './sources/GVPSource';
export { DatasetCache, type DatasetCacheOptions, type DownloadOptions } from './services/DatasetCache';
export { loadVolcanoes, loadEruptions, type LoadOptions } from './services/CsvLoader';
export { mergeVolcanoes, concatEruptions, type MergeResult } from './services/DatasetMerger';
export {
  VolcanoDatabase,
  LocalVolcanoDatabase,
  WebServicesVolcanoDatabase,
  filterVolcanoes,
  type DatabaseMode,
  type DatabaseOptions,
  type LocalDatabaseOptions,
  type EpochSelection,
  type VolcanoFilter,
  type DatabaseStats,
} from './services/VolcanoDatabase';

export {
  DATASETS,
  DATASET_IDS,
  isDatasetId,
  assertDatasetId,
  type DatasetId,
  type DatasetFormat,
  type CacheInfo,
  type CacheMetadata,
} from './types/Dataset';
export type { DatabaseDiagnostic, DiagnosticSink } from './types/Diagnostics';

export { haversineDistance, EARTH_RADIUS_KM, METERS_TO_FEET } from './utils/distance';
export { logger, createLogger } from './utils/logger';
