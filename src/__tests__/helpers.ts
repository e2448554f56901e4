import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AxiosHeaders, type AxiosResponse } from 'axios';

/**
 * Shared fixtures for the test suites
 */

export const VOLCANO_HEADER =
  'VolcanoNumber,VolcanoName,Country,Region,Latitude,Longitude,Elevation,VolcanoType,GeologicEpoch,LastEruptionYear,GeologicalSummary';

export const VOLCANO_CSV = [
  VOLCANO_HEADER,
  '211060,Etna,Italy,Mediterranean,37.748,14.999,3357,Stratovolcano(es),Holocene,2023,"Large basaltic cone, very active"',
  '211040,Stromboli,Italy,Mediterranean,38.789,15.213,924,Stratovolcano,Holocene,2023,Persistent mild explosions',
  '211020,Vesuvius,Italy,Mediterranean,40.821,14.426,1281,Stratovolcano,Holocene,1944,"Somma ""Vesuvius"" complex"',
  '263250,Merapi,Indonesia,Java,-7.54,110.446,2910,Stratovolcano,Holocene,2023,Lava dome growth',
  '300010,unnamed,Japan,Izu Islands,,,N/A,Submarine,Pleistocene,,No coordinates on record',
].join('\n');

export const ERUPTION_CSV = [
  'VolcanoNumber,VolcanoName,EruptionNumber,StartYear,EndYear,VEI,Latitude,Longitude',
  '211060,Etna,22395,2023,2023,2,37.748,14.999',
  '211060,Etna,22300,2021,,3,37.748,14.999',
  '263250,Merapi,22410,2010,2010,4,-7.54,110.446',
].join('\n');

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'volcano-catalog-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(dir: string, name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Minimal successful axios response around a payload
 */
export function axiosResponse(body: string | Buffer): AxiosResponse<Buffer> {
  return {
    data: Buffer.isBuffer(body) ? body : Buffer.from(body, 'utf-8'),
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}
