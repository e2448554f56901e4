import type { Eruption } from '../models/Eruption';
import { compareNumbers, RecordCollection } from './RecordCollection';

export interface EruptionSummaryStats {
  totalEruptions: number;
  uniqueVolcanoes: number;
}

export class EruptionCollection extends RecordCollection<Eruption, EruptionCollection> {
  protected readonly recordLabel = 'eruptions';

  static empty(): EruptionCollection {
    return new EruptionCollection([]);
  }

  protected derive(items: readonly Eruption[]): EruptionCollection {
    return new EruptionCollection(items);
  }

  get eruptions(): Eruption[] {
    return this.toArray();
  }

  filterByVolcanoNumber(volcanoNumber: number): EruptionCollection {
    return this.filter((e) => e.volcanoNumber === volcanoNumber);
  }

  /** Distinct volcano numbers, ascending */
  volcanoNumbers(): number[] {
    const numbers = new Set(this.items.flatMap((e) => (e.volcanoNumber === null ? [] : [e.volcanoNumber])));
    return [...numbers].sort(compareNumbers);
  }

  summaryStats(): EruptionSummaryStats {
    return {
      totalEruptions: this.items.length,
      uniqueVolcanoes: this.volcanoNumbers().length,
    };
  }
}
