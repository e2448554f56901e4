import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadEruptions, loadVolcanoes } from '../CsvLoader';
import { MissingFileError } from '../../errors';
import type { DatabaseDiagnostic } from '../../types/Diagnostics';
import { ERUPTION_CSV, makeTempDir, removeTempDir, VOLCANO_CSV, VOLCANO_HEADER, writeFixture } from '../../__tests__/helpers';

describe('CsvLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('loadVolcanoes', () => {
    it('should load every row in file order', async () => {
      const csvPath = await writeFixture(dir, 'volcanoes.csv', VOLCANO_CSV);

      const volcanoes = await loadVolcanoes(csvPath);

      expect(volcanoes.map((v) => v.name)).toEqual(['Etna', 'Stromboli', 'Vesuvius', 'Merapi', 'Unnamed-300010']);
      expect(volcanoes.at(2)?.geologicalSummary).toBe('Somma "Vesuvius" complex');
    });

    it('should keep rows with malformed numbers', async () => {
      const csvPath = await writeFixture(dir, 'volcanoes.csv', VOLCANO_CSV);

      const unnamed = (await loadVolcanoes(csvPath)).at(4);

      expect(unnamed?.id).toBe(300010);
      expect(unnamed?.elevation).toBeNull();
      expect(unnamed?.latitude).toBeNull();
    });

    it('should tolerate a byte-order mark and surrounding whitespace', async () => {
      const csvPath = await writeFixture(dir, 'bom.csv', '\uFEFF VolcanoNumber , VolcanoName \r\n 211060 ,  Etna \r\n');

      const [etna] = (await loadVolcanoes(csvPath)).volcanoes;

      expect(etna?.id).toBe(211060);
      expect(etna?.fields).toEqual({ VolcanoNumber: '211060', VolcanoName: 'Etna' });
    });

    it('should skip empty rows and report them', async () => {
      const csvPath = await writeFixture(dir, 'gaps.csv', `${VOLCANO_HEADER}\n,,,,,,,,,,\n211060,Etna,Italy,,,,,,,,\n`);
      const onDiagnostic = vi.fn<(diagnostic: DatabaseDiagnostic) => void>();

      const volcanoes = await loadVolcanoes(csvPath, { onDiagnostic });

      expect(volcanoes.map((v) => v.id)).toEqual([211060]);
      expect(onDiagnostic).toHaveBeenCalledTimes(1);
      expect(onDiagnostic).toHaveBeenCalledWith({
        kind: 'skipped-row',
        message: 'Malformed record at row 1: row has no values',
        path: csvPath,
        row: 1,
      });
    });

    it('should keep every row when a free-text cell holds a stray quote', async () => {
      const csvPath = await writeFixture(dir, 'quote.csv', 'VolcanoNumber,VolcanoName,Remarks\n1,A,vent 10" wide\n2,B,ok\n3,C,ok\n');
      const onDiagnostic = vi.fn<(diagnostic: DatabaseDiagnostic) => void>();

      const volcanoes = await loadVolcanoes(csvPath, { onDiagnostic });

      expect(volcanoes.map((v) => v.id)).toEqual([1, 2, 3]);
      expect(volcanoes.at(0)?.remarks).toBe('vent 10" wide');
      expect(onDiagnostic).not.toHaveBeenCalled();
    });

    it('should throw MissingFileError for an absent file', async () => {
      await expect(loadVolcanoes(`${dir}/nope.csv`)).rejects.toBeInstanceOf(MissingFileError);
    });
  });

  describe('loadEruptions', () => {
    it('should load eruptions', async () => {
      const csvPath = await writeFixture(dir, 'eruptions.csv', ERUPTION_CSV);

      const eruptions = await loadEruptions(csvPath);

      expect(eruptions.length).toBe(3);
      expect(eruptions.volcanoNumbers()).toEqual([211060, 263250]);
      expect(eruptions.at(1)?.endYear).toBeNull();
      expect(eruptions.at(2)?.vei).toBe(4);
    });
  });
});
