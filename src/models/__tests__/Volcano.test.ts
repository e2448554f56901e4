import { describe, it, expect } from 'vitest';
import { Volcano } from '../Volcano';
import { UnsupportedUnitError } from '../../errors';

describe('Volcano', () => {
  const etnaRow = {
    VolcanoNumber: '211060',
    VolcanoName: 'Etna',
    Country: 'Italy',
    Region: 'Mediterranean',
    Latitude: '37.748',
    Longitude: '14.999',
    Elevation: '3357',
    VolcanoType: 'Stratovolcano(es)',
    GeologicEpoch: 'Holocene',
    LastEruptionYear: '2023',
    TectonicSetting: 'Subduction zone',
    Custom_Note: 'kept as-is',
  };

  it('should coerce known numeric fields', () => {
    const etna = new Volcano(etnaRow);

    expect(etna.volcanoNumber).toBe(211060);
    expect(etna.id).toBe(211060);
    expect(etna.latitude).toBe(37.748);
    expect(etna.lon).toBe(14.999);
    expect(etna.elevation).toBe(3357);
    expect(etna.lastEruptionYear).toBe(2023);
    expect(etna.origin).toEqual([37.748, 14.999, 3357]);
    expect(etna.invalidFields).toEqual([]);
  });

  it('should expose text fields and pass unknown columns through', () => {
    const etna = new Volcano(etnaRow);

    expect(etna.name).toBe('Etna');
    expect(etna.country).toBe('Italy');
    expect(etna.volcanoType).toBe('Stratovolcano(es)');
    expect(etna.tectonicSetting).toBe('Subduction zone');
    expect(etna.remarks).toBe('');
    expect(etna.getField('Custom_Note')).toBe('kept as-is');
    expect(etna.getField('Missing')).toBeUndefined();
  });

  it('should read web-service column names', () => {
    const volcano = new Volcano({
      Volcano_Number: '263250',
      Volcano_Name: 'Merapi',
      Primary_Volcano_Type: 'Stratovolcano',
      Last_Eruption_Year: '2023',
      Latitude: '-7.54',
      Longitude: '110.446',
      Elevation: '2910',
    });

    expect(volcano.id).toBe(263250);
    expect(volcano.name).toBe('Merapi');
    expect(volcano.volcanoType).toBe('Stratovolcano');
    expect(volcano.lastEruptionYear).toBe(2023);
  });

  it('should read malformed numbers as unknown without throwing', () => {
    const volcano = new Volcano({ ...etnaRow, Elevation: 'N/A', Latitude: '' });

    expect(volcano.elevation).toBeNull();
    expect(volcano.getElevation('ft')).toBeNull();
    expect(volcano.latitude).toBeNull();
    expect(volcano.invalidFields).toEqual(['elevation']);
  });

  it('should reject a non-integer volcano number', () => {
    const volcano = new Volcano({ ...etnaRow, VolcanoNumber: '211060.5' });
    expect(volcano.id).toBeNull();
    expect(volcano.invalidFields).toEqual(['volcanoNumber']);
  });

  it('should rename unnamed volcanoes after their number', () => {
    const volcano = new Volcano({ ...etnaRow, VolcanoNumber: '300010', VolcanoName: 'UNNAMED' });

    expect(volcano.name).toBe('Unnamed-300010');
    expect(volcano.fields.VolcanoName).toBe('Unnamed-300010');
  });

  it('should not modify the row it was built from', () => {
    const row = { ...etnaRow, VolcanoName: 'unnamed' };
    new Volcano(row);
    expect(row.VolcanoName).toBe('unnamed');
  });

  describe('getElevation', () => {
    const volcano = new Volcano({ ...etnaRow, Elevation: '1000' });

    it('should return meters by default', () => {
      expect(volcano.getElevation()).toBe(1000);
      expect(volcano.getElevation('M')).toBe(1000);
    });

    it('should convert to feet', () => {
      expect(volcano.getElevation('ft')).toBeCloseTo(3280.84, 2);
      expect(volcano.getElevation('feet')).toBeCloseTo(3280.84, 2);
    });

    it('should reject other units', () => {
      expect(() => volcano.getElevation('km')).toThrow(UnsupportedUnitError);
    });
  });

  describe('distanceTo', () => {
    it('should be zero at its own position', () => {
      expect(new Volcano(etnaRow).distanceTo(37.748, 14.999)).toBe(0);
    });

    it('should be infinite without coordinates', () => {
      const volcano = new Volcano({ ...etnaRow, Longitude: '' });
      expect(volcano.distanceTo(0, 0)).toBe(Infinity);
    });
  });

  it('should type numeric properties for export', () => {
    const properties = new Volcano({ ...etnaRow, Elevation: 'N/A' }).toProperties();

    expect(properties.VolcanoNumber).toBe(211060);
    expect(properties.Elevation).toBeNull();
    expect(properties.Country).toBe('Italy');
    expect(properties.Custom_Note).toBe('kept as-is');
  });

  it('should describe itself', () => {
    expect(new Volcano(etnaRow).toString()).toBe('Volcano (Etna, Italy, 3357m)');
    expect(new Volcano({ ...etnaRow, Elevation: '' }).toString()).toBe('Volcano (Etna, Italy, Unknown)');
  });
});
