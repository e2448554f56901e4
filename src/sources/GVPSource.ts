import axios from 'axios';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '../config';
import { DownloadFailedError } from '../errors';
import { assertDatasetId, DATASETS, type DatasetFormat } from '../types/Dataset';
import { createLogger } from '../utils/logger';

/**
 * Smithsonian Global Volcanism Program web services (GeoServer WFS)
 * https://volcano.si.edu/
 */

export interface GVPSourceConfig {
  baseUrl: string;
  timeout: number; // milliseconds, applied to every request
}

export interface GVPSourceStats {
  totalFetched: number;
  bytesFetched: number;
  lastFetchTime?: Date;
  errors: number;
  isHealthy: boolean;
}

const MALFORMED_SEQUENCE = Buffer.from('(< ', 'utf-8');
const REPAIRED_SEQUENCE = Buffer.from('(&lt; ', 'utf-8');

/**
 * Rewrite every `(< ` in an upstream payload to `(&lt; `.
 * GVP emits the bare form in some free-text columns and it must never reach the cache.
 */
export function repairPayload(raw: Buffer): Buffer {
  let index = raw.indexOf(MALFORMED_SEQUENCE);
  if (index === -1) {
    return raw;
  }

  const parts: Buffer[] = [];
  let start = 0;
  while (index !== -1) {
    parts.push(raw.subarray(start, index), REPAIRED_SEQUENCE);
    start = index + MALFORMED_SEQUENCE.length;
    index = raw.indexOf(MALFORMED_SEQUENCE, start);
  }
  parts.push(raw.subarray(start));

  return Buffer.concat(parts);
}

export class GVPSource {
  private readonly config: GVPSourceConfig;
  private readonly stats: GVPSourceStats;
  private readonly logger = createLogger({ component: 'DataSource', source: 'GVP' });

  constructor(config?: Partial<GVPSourceConfig>) {
    this.config = {
      baseUrl: config?.baseUrl ?? DEFAULT_BASE_URL,
      timeout: config?.timeout ?? DEFAULT_TIMEOUT_MS,
    };
    this.stats = {
      totalFetched: 0,
      bytesFetched: 0,
      errors: 0,
      isHealthy: true,
    };
  }

  getTimeout(): number {
    return this.config.timeout;
  }

  getStats(): GVPSourceStats {
    return { ...this.stats };
  }

  /**
   * WFS GetFeature request for a dataset
   */
  buildUrl(dataset: string, format: DatasetFormat = 'csv'): string {
    const typeName = DATASETS[assertDatasetId(dataset)];

    const params = new URLSearchParams({
      service: 'WFS',
      version: '1.0.0',
      request: 'GetFeature',
      typeName,
      outputFormat: format === 'geojson' ? 'geojson' : 'csv',
    });

    return `${this.config.baseUrl}?${params.toString()}`;
  }

  /**
   * Download a dataset in one GET and return the repaired bytes.
   * Any transport error or non-2xx status becomes a DownloadFailedError; there are no retries.
   */
  async fetchDataset(dataset: string, format: DatasetFormat = 'csv'): Promise<Buffer> {
    const url = this.buildUrl(dataset, format);

    try {
      this.logger.debug({ url, timeout: this.config.timeout }, 'Fetching GVP dataset...');

      const response = await axios.get<ArrayBuffer>(url, {
        timeout: this.config.timeout,
        responseType: 'arraybuffer',
      });

      const content = repairPayload(Buffer.from(response.data));
      this.updateStats(true, content.length);
      this.logger.info({ dataset, bytes: content.length }, 'Fetched GVP dataset');

      return content;
    } catch (error) {
      this.updateStats(false);

      if (axios.isAxiosError(error)) {
        this.logger.error({
          error: error.message,
          status: error.response?.status,
          url,
        }, 'GVP web services error');
        throw new DownloadFailedError(url, error, error.response?.status);
      }

      this.logger.error({ err: error, url }, 'Error fetching GVP dataset');
      throw new DownloadFailedError(url, error);
    }
  }

  private updateStats(success: boolean, bytes: number = 0): void {
    this.stats.lastFetchTime = new Date();
    if (success) {
      this.stats.totalFetched += 1;
      this.stats.bytesFetched += bytes;
      this.stats.isHealthy = true;
    } else {
      this.stats.errors += 1;
      this.stats.isHealthy = false;
    }
  }
}
