import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { GVPSource, repairPayload } from '../GVPSource';
import { DownloadFailedError, InvalidDatasetError } from '../../errors';
import { axiosResponse } from '../../__tests__/helpers';

// Mock axios
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const log = vi.hoisted(() => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));
vi.mock('../../utils/logger', () => ({ createLogger: () => log }));

describe('GVPSource', () => {
  let source: GVPSource;

  beforeEach(() => {
    vi.clearAllMocks();
    source = new GVPSource({ baseUrl: 'https://gvp.test/ows', timeout: 5000 });
  });

  describe('repairPayload', () => {
    it('should rewrite every malformed sequence', () => {
      const raw = Buffer.from('a (< 1 km) and (< 2 km)', 'utf-8');
      expect(repairPayload(raw).toString('utf-8')).toBe('a (&lt; 1 km) and (&lt; 2 km)');
    });

    it('should leave other bytes alone', () => {
      const raw = Buffer.from('a <b> (<x) (&lt; 1)', 'utf-8');
      expect(repairPayload(raw).toString('utf-8')).toBe('a <b> (<x) (&lt; 1)');
    });

    it('should handle the sequence at both ends', () => {
      const raw = Buffer.from('(< start end(< ', 'utf-8');
      expect(repairPayload(raw).toString('utf-8')).toBe('(&lt; start end(&lt; ');
    });
  });

  describe('buildUrl', () => {
    it('should build a WFS GetFeature request', () => {
      expect(source.buildUrl('holocene_volcanoes')).toBe(
        'https://gvp.test/ows?service=WFS&version=1.0.0&request=GetFeature' +
          '&typeName=GVP-VOTW%3ASmithsonian_VOTW_Holocene_Volcanoes&outputFormat=csv',
      );
    });

    it('should request geojson output when asked', () => {
      expect(source.buildUrl('pleistocene_eruptions', 'geojson')).toContain('outputFormat=geojson');
    });

    it('should reject unknown datasets', () => {
      expect(() => source.buildUrl('recent_earthquakes')).toThrow(InvalidDatasetError);
    });
  });

  describe('fetchDataset', () => {
    it('should fetch with the configured timeout and repair the payload', async () => {
      mockedAxios.get.mockResolvedValueOnce(axiosResponse('Name,Note\nEtna,(< 5 km)\n'));

      const data = await source.fetchDataset('holocene_volcanoes');

      expect(mockedAxios.get).toHaveBeenCalledTimes(1);
      expect(mockedAxios.get).toHaveBeenCalledWith(source.buildUrl('holocene_volcanoes'), {
        timeout: 5000,
        responseType: 'arraybuffer',
      });
      expect(data.toString('utf-8')).toBe('Name,Note\nEtna,(&lt; 5 km)\n');
      expect(source.getStats()).toMatchObject({ totalFetched: 1, bytesFetched: data.length, errors: 0, isHealthy: true });
    });

    it('should wrap network errors', async () => {
      const networkError = new Error('connect ECONNREFUSED');
      mockedAxios.get.mockRejectedValueOnce(networkError);

      const attempt = source.fetchDataset('holocene_eruptions');

      await expect(attempt).rejects.toBeInstanceOf(DownloadFailedError);
      await expect(attempt).rejects.toMatchObject({
        code: 'DOWNLOAD_FAILED',
        url: source.buildUrl('holocene_eruptions'),
      });
      expect(source.getStats()).toMatchObject({ errors: 1, isHealthy: false });
      expect(log.error).toHaveBeenCalledWith(
        { err: networkError, url: source.buildUrl('holocene_eruptions') },
        'Error fetching GVP dataset',
      );
    });

    it('should carry the HTTP status of a failed response', async () => {
      const httpError = Object.assign(new Error('Request failed with status code 503'), {
        isAxiosError: true,
        response: { status: 503 },
      });
      mockedAxios.get.mockRejectedValueOnce(httpError);
      mockedAxios.isAxiosError.mockReturnValueOnce(true);

      const error = await source.fetchDataset('holocene_volcanoes').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadFailedError);
      expect(error).toMatchObject({ status: 503, cause: httpError });
    });

    it('should not fetch for unknown datasets', async () => {
      await expect(source.fetchDataset('nope')).rejects.toThrow(InvalidDatasetError);
      expect(mockedAxios.get).not.toHaveBeenCalled();
    });
  });
});
