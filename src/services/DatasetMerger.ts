import { EruptionCollection } from '../collections/EruptionCollection';
import { compareNumbers } from '../collections/RecordCollection';
import { VolcanoCollection } from '../collections/VolcanoCollection';
import type { Eruption } from '../models/Eruption';
import type { Volcano } from '../models/Volcano';
import type { DatabaseDiagnostic } from '../types/Diagnostics';

/** How many colliding volcano numbers a duplicate warning lists */
export const DUPLICATE_SAMPLE_SIZE = 10;

export interface MergeResult {
  volcanoes: VolcanoCollection;
  /** Distinct volcano numbers present in both inputs, ascending */
  duplicateIds: number[];
  /** Set when Pleistocene records were dropped */
  warning?: Extract<DatabaseDiagnostic, { kind: 'duplicate-volcanoes' }>;
}

/**
 * Combine Holocene and Pleistocene volcanoes.
 *
 * The two datasets overlap at the epoch boundary and Holocene is
 * authoritative: every Holocene record is kept, in order, followed by the
 * Pleistocene records whose volcano number is not already present. Records
 * without a volcano number never collide.
 */
export function mergeVolcanoes(holocene: Iterable<Volcano>, pleistocene: Iterable<Volcano>): MergeResult {
  const kept = [...holocene];
  const holoceneIds = new Set(kept.flatMap((v) => (v.volcanoNumber === null ? [] : [v.volcanoNumber])));

  const collisions = new Set<number>();
  let dropped = 0;

  for (const volcano of pleistocene) {
    const id = volcano.volcanoNumber;
    if (id !== null && holoceneIds.has(id)) {
      collisions.add(id);
      dropped += 1;
    } else {
      kept.push(volcano);
    }
  }

  const duplicateIds = [...collisions].sort(compareNumbers);
  const result: MergeResult = { volcanoes: new VolcanoCollection(kept), duplicateIds };

  if (dropped > 0) {
    const sample = duplicateIds.slice(0, DUPLICATE_SAMPLE_SIZE);
    const more = duplicateIds.length > DUPLICATE_SAMPLE_SIZE ? ', ...' : '';
    result.warning = {
      kind: 'duplicate-volcanoes',
      message:
        `Removed ${dropped} duplicate volcano(es) from Pleistocene dataset ` +
        `(keeping Holocene records). Duplicate volcano numbers: ${sample.join(', ')}${more}`,
      count: dropped,
      volcanoNumbers: sample,
    };
  }

  return result;
}

/**
 * Eruptions carry no per-record identity at this level, so they are simply appended
 */
export function concatEruptions(first: Iterable<Eruption>, second: Iterable<Eruption>): EruptionCollection {
  return new EruptionCollection([...first, ...second]);
}
