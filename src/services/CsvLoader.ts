import { readFile } from 'node:fs/promises';
import { EruptionCollection } from '../collections/EruptionCollection';
import { VolcanoCollection } from '../collections/VolcanoCollection';
import { MalformedRecordError, MissingFileError } from '../errors';
import { Eruption } from '../models/Eruption';
import { Volcano } from '../models/Volcano';
import type { DiagnosticSink } from '../types/Diagnostics';
import { parseCsv, type CsvRow } from '../utils/csv';
import { createLogger } from '../utils/logger';

export interface LoadOptions {
  onDiagnostic?: DiagnosticSink;
}

interface LoadedRecord {
  readonly invalidFields: readonly string[];
}

const logger = createLogger({ component: 'CsvLoader' });

async function readCsvText(csvPath: string): Promise<string> {
  try {
    return await readFile(csvPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MissingFileError(csvPath, error);
    }
    throw error;
  }
}

/**
 * Parse a CSV file into records, one per data row.
 *
 * A row that cannot become a record is skipped and reported; the rest of
 * the file still loads. Numeric columns that fail to parse do not skip the
 * row, they read as unknown.
 */
async function loadRecords<T extends LoadedRecord>(
  csvPath: string,
  build: (row: CsvRow) => T,
  label: string,
  options: LoadOptions,
): Promise<T[]> {
  const { header, rows } = parseCsv(await readCsvText(csvPath));
  logger.debug({ path: csvPath, columns: header }, 'CSV columns found');

  const records: T[] = [];
  let degradedRows = 0;

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    try {
      if (Object.values(row).every((value) => value === '')) {
        throw new MalformedRecordError(rowNumber, 'row has no values');
      }

      const record = build(row);
      if (record.invalidFields.length > 0) {
        degradedRows += 1;
        logger.debug({ row: rowNumber, fields: record.invalidFields }, 'Unparseable numeric fields read as unknown');
      }
      records.push(record);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ path: csvPath, row: rowNumber, error: message }, 'Skipping row');
      options.onDiagnostic?.({ kind: 'skipped-row', message, path: csvPath, row: rowNumber });
    }
  });

  logger.info({ path: csvPath, count: records.length, degradedRows }, `Loaded ${records.length} ${label}`);
  return records;
}

/**
 * @throws MissingFileError when the file does not exist
 */
export async function loadVolcanoes(csvPath: string, options: LoadOptions = {}): Promise<VolcanoCollection> {
  const volcanoes = await loadRecords(csvPath, (row) => new Volcano(row), 'volcanoes', options);
  return new VolcanoCollection(volcanoes);
}

/**
 * @throws MissingFileError when the file does not exist
 */
export async function loadEruptions(csvPath: string, options: LoadOptions = {}): Promise<EruptionCollection> {
  const eruptions = await loadRecords(csvPath, (row) => new Eruption(row), 'eruptions', options);
  return new EruptionCollection(eruptions);
}
