import { GraphRetriever, fallbackGraphSearch } from '../retrieval/graph-retriever';
import { FakeGraphClient } from './helpers/fakes';

const titles = (documents: Array<{ title: string }>) => documents.map(d => d.title);

describe('fallbackGraphSearch', () => {
  test('returns the ai entry for "What is AI?"', () => {
    const documents = fallbackGraphSearch('What is AI?', 5);

    expect(titles(documents)).toEqual(['Artificial Intelligence']);
    expect(documents[0]).toEqual({
      kind: 'graph',
      title: 'Artificial Intelligence',
      content: expect.stringContaining('Field of computer science'),
      reference: 'graph:fallback:ai001',
      confidence: 0.85,
      category: 'technology',
    });
  });

  test('prefers keys contained in the query', () => {
    expect(titles(fallbackGraphSearch('deep learning basics', 5))).toEqual(['Deep Learning']);
    expect(titles(fallbackGraphSearch('What is machine learning?', 5))).toEqual(['Machine Learning']);
  });

  test('falls back to any shared word', () => {
    expect(titles(fallbackGraphSearch('learning rates', 5))).toEqual(['Machine Learning', 'Deep Learning']);
  });

  test('uses the generic AI bundle for AI terms that match no key', () => {
    expect(titles(fallbackGraphSearch('artificial intelligence', 5))).toEqual([
      'Artificial Intelligence',
      'Machine Learning',
      'Deep Learning',
    ]);
  });

  test('returns the whole table, truncated, when nothing matches', () => {
    expect(titles(fallbackGraphSearch('gardening tips', 3))).toEqual([
      'Artificial Intelligence',
      'Machine Learning',
      'Deep Learning',
    ]);
    expect(fallbackGraphSearch('gardening tips', 10)).toHaveLength(6);
    expect(fallbackGraphSearch('gardening tips', 0)).toEqual([]);
  });

  test('is a pure function of the query', () => {
    expect(fallbackGraphSearch('neural networks and vision', 5)).toEqual(
      fallbackGraphSearch('neural networks and vision', 5)
    );
  });
});

describe('GraphRetriever.search', () => {
  test('uses the fallback table without touching a disconnected backend', async () => {
    const client = new FakeGraphClient(false);
    const retriever = new GraphRetriever(client);

    const documents = await retriever.search('What is AI?', 5);

    expect(titles(documents)).toEqual(['Artificial Intelligence']);
    expect(client.calls).toHaveLength(0);
  });

  test('formats concept rows with up to three relationship mentions', async () => {
    const client = new FakeGraphClient(true, [
      {
        title: 'Transformers',
        summary: 'Attention based architecture.',
        category: 'architecture',
        confidence: 0.9,
        node_id: 't1',
        relationships: [
          { relation: 'USES', target: 'Attention' },
          { relation: 'PART_OF', target: 'Deep Learning' },
          { relation: 'INSPIRED', target: 'Seq2Seq' },
          { relation: 'RELATED', target: 'RNN' },
        ],
      },
    ]);
    const retriever = new GraphRetriever(client);

    const [document] = await retriever.search('transformers', 3);

    expect(client.calls[0].params).toEqual({ query: 'transformers', max_results: 3 });
    expect(document.kind).toBe('graph');
    expect(document.content).toBe(
      'Attention based architecture. Related to: Attention (USES), Deep Learning (PART_OF), Seq2Seq (INSPIRED)'
    );
    expect(document.reference).toBe('graph:t1');
    expect(document.confidence).toBe(0.9);
    expect(document.category).toBe('architecture');
    expect(document.relationships).toHaveLength(4);
  });

  test('applies defaults and ignores empty relationship maps', async () => {
    const client = new FakeGraphClient(true, [
      {
        title: 'Backpropagation',
        summary: 'Gradient computation by the chain rule.',
        category: null,
        confidence: null,
        node_id: 42,
        relationships: [{ relation: null, target: null }],
      },
    ]);

    const [document] = await new GraphRetriever(client).search('gradient', 5);

    expect(document).toEqual({
      kind: 'graph',
      title: 'Backpropagation',
      content: 'Gradient computation by the chain rule.',
      reference: 'graph:42',
      confidence: 0.8,
      category: 'general',
      relationships: [],
    });
  });

  test('returns nothing when a connected backend has no match', async () => {
    const documents = await new GraphRetriever(new FakeGraphClient(true, [])).search('What is AI?', 5);

    expect(documents).toEqual([]);
  });

  test('falls back when the query fails', async () => {
    const client = new FakeGraphClient(true, new Error('connection reset'));

    const documents = await new GraphRetriever(client).search('What is machine learning?', 5);

    expect(titles(documents)).toEqual(['Machine Learning']);
  });

  test('skips malformed rows and keeps the valid ones', async () => {
    const client = new FakeGraphClient(true, [
      {
        title: 'Quantum Computing',
        summary: 'Computation with qubits.',
        category: 'physics',
        confidence: 0.9,
        node_id: 'q1',
        relationships: [],
      },
      { title: null, summary: 'quantum stuff', category: null, confidence: null, node_id: 'q2', relationships: [] },
    ]);

    const documents = await new GraphRetriever(client).search('quantum', 5);

    expect(titles(documents)).toEqual(['Quantum Computing']);
    expect(documents[0].reference).toBe('graph:q1');
  });

  test('returns nothing when every row is malformed', async () => {
    const client = new FakeGraphClient(true, [{ summary: 'no title here' }]);

    expect(await new GraphRetriever(client).search('deep learning', 5)).toEqual([]);
  });

  test('clamps backend confidence into [0, 1]', async () => {
    const client = new FakeGraphClient(true, [
      { title: 'Overconfident', summary: 'a', confidence: 1.5, node_id: 'o1' },
      { title: 'Negative', summary: 'b', confidence: -0.2, node_id: 'n1' },
    ]);

    const documents = await new GraphRetriever(client).search('anything', 5);

    expect(documents.map(d => d.confidence)).toEqual([1, 0]);
  });
});

describe('GraphRetriever.getRelated', () => {
  test('has no fallback data when the backend is unavailable', async () => {
    const client = new FakeGraphClient(false);

    expect(await new GraphRetriever(client).getRelated('Machine Learning', 3)).toEqual([]);
    expect(client.calls).toHaveLength(0);
  });

  test('maps neighbour rows to graph_related documents', async () => {
    const client = new FakeGraphClient(true, [
      { title: 'Deep Learning', summary: 'Layered networks.', relationship: 'SUBFIELD_OF', rel_confidence: 0.95 },
      { title: 'Statistics', summary: null, relationship: null, rel_confidence: null },
    ]);

    const documents = await new GraphRetriever(client).getRelated('Machine Learning', 3);

    expect(client.calls[0].params).toEqual({ concept_name: 'Machine Learning', max_related: 3 });
    expect(documents).toEqual([
      {
        kind: 'graph_related',
        title: 'Deep Learning',
        content: 'Layered networks.',
        reference: 'graph:related:Machine Learning',
        confidence: 0.95,
        relationships: [{ relation: 'SUBFIELD_OF', target: 'Machine Learning' }],
      },
      {
        kind: 'graph_related',
        title: 'Statistics',
        content: '',
        reference: 'graph:related:Machine Learning',
        confidence: 0.7,
        relationships: [{ relation: 'RELATED_TO', target: 'Machine Learning' }],
      },
    ]);
  });

  test('skips neighbour rows without a title and clamps their confidence', async () => {
    const client = new FakeGraphClient(true, [
      { title: null, summary: 'orphan', relationship: 'RELATED_TO', rel_confidence: 0.5 },
      { title: 'Statistics', summary: 'Inference.', relationship: 'USES', rel_confidence: 2 },
    ]);

    const documents = await new GraphRetriever(client).getRelated('Machine Learning', 3);

    expect(documents.map(d => [d.title, d.confidence])).toEqual([['Statistics', 1]]);
  });

  test('returns nothing when the lookup fails', async () => {
    const client = new FakeGraphClient(true, new Error('timeout'));

    expect(await new GraphRetriever(client).getRelated('Machine Learning')).toEqual([]);
  });
});
