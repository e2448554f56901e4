import { z } from 'zod';
import { InvalidDatasetError } from '../errors';

/**
 * GVP web-service datasets and the WFS type each is published under.
 * The set is fixed; anything else is rejected.
 */
export const DATASETS = {
  holocene_volcanoes: 'GVP-VOTW:Smithsonian_VOTW_Holocene_Volcanoes',
  holocene_eruptions: 'GVP-VOTW:Smithsonian_VOTW_Holocene_Eruptions',
  pleistocene_volcanoes: 'GVP-VOTW:Smithsonian_VOTW_Pleistocene_Volcanoes',
  pleistocene_eruptions: 'GVP-VOTW:Smithsonian_VOTW_Pleistocene_Eruptions',
} as const;

export type DatasetId = keyof typeof DATASETS;

export type DatasetFormat = 'csv' | 'geojson';

export const DATASET_IDS = Object.freeze(Object.keys(DATASETS).filter(isDatasetId));

export function isDatasetId(value: string): value is DatasetId {
  return Object.prototype.hasOwnProperty.call(DATASETS, value);
}

export function assertDatasetId(value: string): DatasetId {
  if (!isDatasetId(value)) {
    throw new InvalidDatasetError(value, DATASET_IDS);
  }
  return value;
}

/**
 * Metadata sidecar written next to each cached payload
 */
export const cacheMetadataSchema = z.object({
  dataset: z.string(),
  download_time: z.string(),
  download_timestamp: z.number(),
  file_path: z.string(),
  file_size: z.number().int().nonnegative(),
});

export type CacheMetadata = z.infer<typeof cacheMetadataSchema>;

export type CacheInfo =
  | {
      cached: true;
      downloadTime: string;
      fileSize: number;
      filePath: string;
    }
  | {
      cached: false;
      filePath: string;
    };
