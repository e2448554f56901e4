import type { Volcano } from '../models/Volcano';
import { compareNumbers, RecordCollection } from './RecordCollection';

export interface VolcanoSummaryStats {
  totalVolcanoes: number;
  countries: number;
  volcanoTypes: number;
  avgElevation: number | null;
  maxElevation: number | null;
  minElevation: number | null;
}

/**
 * A collection of volcanoes with filtering, geographic queries and export
 */
export class VolcanoCollection extends RecordCollection<Volcano, VolcanoCollection> {
  protected readonly recordLabel = 'volcanoes';

  static empty(): VolcanoCollection {
    return new VolcanoCollection([]);
  }

  protected derive(items: readonly Volcano[]): VolcanoCollection {
    return new VolcanoCollection(items);
  }

  get volcanoes(): Volcano[] {
    return this.toArray();
  }

  /** Exact country match, ignoring case */
  filterByCountry(country: string): VolcanoCollection {
    const wanted = country.toLowerCase();
    return this.filter((v) => v.country.toLowerCase() === wanted);
  }

  /** Substring match on volcano type, ignoring case */
  filterByType(volcanoType: string): VolcanoCollection {
    const wanted = volcanoType.toLowerCase();
    return this.filter((v) => v.volcanoType.toLowerCase().includes(wanted));
  }

  /**
   * Inclusive elevation range in meters; volcanoes with unknown elevation are dropped
   */
  filterByElevationRange(minElevation: number, maxElevation: number): VolcanoCollection {
    return this.filter((v) => {
      const elevation = v.elevation;
      return elevation !== null && elevation >= minElevation && elevation <= maxElevation;
    });
  }

  /**
   * Volcanoes no farther than radiusKm from a point (boundary included).
   * Volcanoes without coordinates are never within any radius.
   */
  withinRadius(lat: number, lon: number, radiusKm: number): VolcanoCollection {
    return this.filter((v) => v.distanceTo(lat, lon) <= radiusKm);
  }

  /**
   * Nearest first; volcanoes without coordinates go last
   */
  sortByDistance(lat: number, lon: number): VolcanoCollection {
    const distances = new Map(this.items.map((v) => [v, v.distanceTo(lat, lon)]));
    return this.sort((a, b) => compareNumbers(distances.get(a) ?? Infinity, distances.get(b) ?? Infinity));
  }

  /**
   * Sort by elevation, highest first by default.
   * Unknown elevation ranks as -Infinity: last when descending, first when ascending.
   */
  sortByElevation(descending: boolean = true): VolcanoCollection {
    const key = (v: Volcano) => v.elevation ?? -Infinity;
    return this.sort((a, b) => (descending ? compareNumbers(key(b), key(a)) : compareNumbers(key(a), key(b))));
  }

  latitudes(): number[] {
    return this.items.flatMap((v) => (v.latitude === null ? [] : [v.latitude]));
  }

  longitudes(): number[] {
    return this.items.flatMap((v) => (v.longitude === null ? [] : [v.longitude]));
  }

  elevations(): number[] {
    return this.items.flatMap((v) => (v.elevation === null ? [] : [v.elevation]));
  }

  /** Distinct volcano numbers, ascending */
  volcanoNumbers(): number[] {
    const numbers = new Set(this.items.flatMap((v) => (v.volcanoNumber === null ? [] : [v.volcanoNumber])));
    return [...numbers].sort(compareNumbers);
  }

  summaryStats(): VolcanoSummaryStats {
    const elevations = this.elevations();

    return {
      totalVolcanoes: this.items.length,
      countries: new Set(this.items.map((v) => v.country)).size,
      volcanoTypes: new Set(this.items.map((v) => v.volcanoType)).size,
      avgElevation: elevations.length > 0 ? elevations.reduce((sum, e) => sum + e, 0) / elevations.length : null,
      maxElevation: elevations.length > 0 ? Math.max(...elevations) : null,
      minElevation: elevations.length > 0 ? Math.min(...elevations) : null,
    };
  }
}
