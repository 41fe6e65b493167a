export interface IndexHit {
  /** Insertion position; pairs with the document at the same slot */
  position: number;
  /** Squared L2 distance */
  distance: number;
}

export interface SerializedIndex {
  dimension: number;
  vectors: number[][];
}

/**
 * Exact nearest-neighbour index over fixed-dimension vectors using squared
 * Euclidean distance. Vectors are addressed by insertion position only.
 */
export class FlatL2Index {
  private vectors: Float32Array[] = [];

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid index dimension: ${dimension}`);
    }
  }

  size(): number {
    return this.vectors.length;
  }

  add(vector: ArrayLike<number>): number {
    this.vectors.push(this.toVector(vector));
    return this.vectors.length - 1;
  }

  /**
   * Returns up to `k` hits ordered by ascending distance; ties keep
   * insertion order.
   */
  search(query: ArrayLike<number>, k: number): IndexHit[] {
    const target = this.toVector(query);
    const limit = Math.min(Math.max(0, Math.floor(k)), this.vectors.length);
    if (limit === 0) return [];

    const hits = this.vectors.map((vector, position) => ({
      position,
      distance: squaredL2(vector, target),
    }));

    hits.sort((a, b) => a.distance - b.distance || a.position - b.position);
    return hits.slice(0, limit);
  }

  toJSON(): SerializedIndex {
    return {
      dimension: this.dimension,
      vectors: this.vectors.map(vector => Array.from(vector)),
    };
  }

  static fromJSON(data: SerializedIndex): FlatL2Index {
    const index = new FlatL2Index(data.dimension);
    for (const vector of data.vectors) {
      index.add(vector);
    }
    return index;
  }

  private toVector(values: ArrayLike<number>): Float32Array {
    if (values.length !== this.dimension) {
      throw new Error(`Vector dimension ${values.length} does not match index dimension ${this.dimension}`);
    }
    const vector = Float32Array.from(values);
    if (vector.some(value => !Number.isFinite(value))) {
      throw new Error('Vector contains non-finite values');
    }
    return vector;
  }
}

function squaredL2(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
}
