import { HashingEmbedder } from '../services/embedding.service';

describe('HashingEmbedder', () => {
  const embedder = new HashingEmbedder(16);

  test('names itself after its dimension', () => {
    expect(embedder.name).toBe('hashing:16');
  });

  test('is deterministic and ignores case and punctuation', async () => {
    const first = await embedder.embed('Graph databases, explained');

    expect(first).toHaveLength(16);
    expect(await embedder.embed('graph DATABASES explained!')).toEqual(first);
  });

  test('produces unit-length vectors', async () => {
    const vector = await embedder.embed('neural networks learn representations');
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));

    expect(norm).toBeCloseTo(1);
  });

  test('maps text without tokens to the zero vector', async () => {
    expect(await embedder.embed('  ?! ')).toEqual(new Array<number>(16).fill(0));
  });

  test('rejects invalid dimensions', () => {
    expect(() => new HashingEmbedder(0)).toThrow('Invalid embedding dimension: 0');
  });
});
