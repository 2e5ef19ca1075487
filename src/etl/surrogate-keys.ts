import { DataIntegrityError } from '../errors';

type NaturalKey = number | string;

/**
 * Maps natural keys to surrogate keys. Keys are handed out 1..n in ascending
 * natural-key order, so the same set of natural keys always yields the same
 * assignment.
 */
export class SurrogateKeyMap<K extends NaturalKey> {
  private readonly keys = new Map<K, number>();

  private constructor(
    public readonly dimension: string,
    naturalKeys: K[]
  ) {
    const sorted = [...naturalKeys].sort(compareNaturalKeys);
    sorted.forEach((naturalKey, index) => {
      this.keys.set(naturalKey, index + 1);
    });
  }

  /** Builds the map from unique natural keys; a repeated key is an integrity violation. */
  static fromUnique<K extends NaturalKey>(dimension: string, naturalKeys: K[]): SurrogateKeyMap<K> {
    const seen = new Set<K>();
    for (const naturalKey of naturalKeys) {
      if (seen.has(naturalKey)) {
        throw new DataIntegrityError(`Duplicate natural key ${naturalKey} in ${dimension}`, {
          dimension,
          naturalKey,
        });
      }
      seen.add(naturalKey);
    }
    return new SurrogateKeyMap(dimension, naturalKeys);
  }

  /** Builds the map from observed values, collapsing repeats. */
  static fromDistinct<K extends NaturalKey>(dimension: string, values: K[]): SurrogateKeyMap<K> {
    return new SurrogateKeyMap(dimension, [...new Set(values)]);
  }

  resolve(naturalKey: K | null | undefined): number | undefined {
    if (naturalKey === null || naturalKey === undefined) {
      return undefined;
    }
    return this.keys.get(naturalKey);
  }

  require(naturalKey: K): number {
    const surrogateKey = this.keys.get(naturalKey);
    if (surrogateKey === undefined) {
      throw new DataIntegrityError(`No ${this.dimension} key for ${naturalKey}`, {
        dimension: this.dimension,
        naturalKey,
      });
    }
    return surrogateKey;
  }

  get size(): number {
    return this.keys.size;
  }

  entries(): Array<[K, number]> {
    return [...this.keys.entries()];
  }
}

function compareNaturalKeys(a: NaturalKey, b: NaturalKey): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
