import { z } from 'zod';
import { logger } from '../core/logger';
import { getErrorMessage } from '../core/errors';
import { GraphClient, GraphRow } from '../services/graph-db.service';
import { Relationship, SourceDocument } from '../types';
import fallbackKnowledge from '../data/fallback-knowledge.json';

const DEFAULT_CONCEPT_CONFIDENCE = 0.8;
const DEFAULT_RELATED_CONFIDENCE = 0.7;
const MAX_RELATIONSHIP_MENTIONS = 3;
const AI_TOPIC_TERMS = ['ai', 'artificial', 'intelligence', 'machine', 'learning'];
const AI_TOPIC_BUNDLE = ['ai', 'machine learning', 'deep learning'];

export const CONCEPT_SEARCH_QUERY = `
  MATCH (n:Concept)
  WHERE toLower(n.title) CONTAINS toLower($query)
     OR toLower(n.summary) CONTAINS toLower($query)
  OPTIONAL MATCH (n)-[r]-(related:Concept)
  WITH n, collect({relation: type(r), target: related.title}) AS relationships
  RETURN n.title AS title, n.summary AS summary, n.category AS category,
         n.confidence AS confidence, n.id AS node_id, relationships
  LIMIT $max_results
`;

export const RELATED_CONCEPTS_QUERY = `
  MATCH (n:Concept {title: $concept_name})-[r]-(related:Concept)
  RETURN related.title AS title, related.summary AS summary,
         type(r) AS relationship, r.confidence AS rel_confidence
  LIMIT $max_related
`;

const ConceptRowSchema = z.object({
  title: z.string(),
  summary: z.string().nullish(),
  category: z.string().nullish(),
  confidence: z.number().nullish(),
  node_id: z.union([z.string(), z.number()]).nullish(),
  relationships: z
    .array(z.object({ relation: z.string().nullish(), target: z.string().nullish() }))
    .nullish(),
});

const RelatedRowSchema = z.object({
  title: z.string(),
  summary: z.string().nullish(),
  relationship: z.string().nullish(),
  rel_confidence: z.number().nullish(),
});

interface FallbackEntry {
  title: string;
  content: string;
  reference: string;
  confidence: number;
  category: string;
}

const FALLBACK_TABLE: ReadonlyArray<[string, FallbackEntry]> = Object.entries(fallbackKnowledge);

export class GraphRetriever {
  constructor(private client: GraphClient) {}

  /**
   * Concept search over title and summary with one hop of relationships.
   * Falls back to the static table when the backend is unavailable or the
   * query fails; a connected backend with no matches yields no documents.
   */
  async search(query: string, maxResults: number): Promise<SourceDocument[]> {
    if (!this.client.isConnected()) {
      return fallbackGraphSearch(query, maxResults);
    }

    try {
      const rows = await this.client.execute(CONCEPT_SEARCH_QUERY, {
        query,
        max_results: maxResults,
      });

      const documents = parseRows(rows.slice(0, maxResults), ConceptRowSchema, 'concept').map(toConceptDocument);

      logger.info('Graph search completed', { results: documents.length });
      return documents;
    } catch (error) {
      logger.warn('Graph search failed - using fallback data', { error: getErrorMessage(error) });
      return fallbackGraphSearch(query, maxResults);
    }
  }

  /**
   * One-hop neighbours of a concept. There is no static table for
   * relations, so an unavailable backend yields no documents.
   */
  async getRelated(concept: string, maxRelated: number = 3): Promise<SourceDocument[]> {
    if (!this.client.isConnected()) {
      return [];
    }

    try {
      const rows = await this.client.execute(RELATED_CONCEPTS_QUERY, {
        concept_name: concept,
        max_related: maxRelated,
      });

      return parseRows(rows.slice(0, maxRelated), RelatedRowSchema, 'related concept').map(parsed => ({
        kind: 'graph_related' as const,
        title: parsed.title,
        content: parsed.summary ?? '',
        reference: `graph:related:${concept}`,
        confidence: clampConfidence(parsed.rel_confidence ?? DEFAULT_RELATED_CONFIDENCE),
        relationships: [{ relation: parsed.relationship ?? 'RELATED_TO', target: concept }],
      }));
    } catch (error) {
      logger.error('Related concepts search failed', { concept, error: getErrorMessage(error) });
      return [];
    }
  }
}

/**
 * Keeps the rows that match the schema. A single malformed node (for
 * instance one without a title) is logged and skipped.
 */
function parseRows<T>(rows: GraphRow[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T[] {
  const parsed: T[] = [];
  rows.forEach((row, position) => {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      logger.warn(`Skipping malformed ${label} row`, {
        position,
        issue: result.error.issues[0]?.message,
      });
    }
  });
  return parsed;
}

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function toConceptDocument(row: z.infer<typeof ConceptRowSchema>): SourceDocument {
  // OPTIONAL MATCH with no neighbour collects a map of nulls
  const relationships: Relationship[] = (row.relationships ?? []).flatMap(rel =>
    rel.target && rel.relation ? [{ relation: rel.relation, target: rel.target }] : []
  );

  let content = row.summary ?? '';
  if (relationships.length > 0) {
    content += ' Related to: ' + relationships
      .slice(0, MAX_RELATIONSHIP_MENTIONS)
      .map(rel => `${rel.target} (${rel.relation})`)
      .join(', ');
  }

  return {
    kind: 'graph',
    title: row.title,
    content,
    reference: `graph:${row.node_id ?? 'unknown'}`,
    confidence: clampConfidence(row.confidence ?? DEFAULT_CONCEPT_CONFIDENCE),
    category: row.category ?? 'general',
    relationships,
  };
}

/**
 * Static stand-in for the graph. Selection order: keys contained in the
 * query, then keys sharing any word with it, then the generic AI bundle,
 * then the whole table. Pure: same query, same answer.
 */
export function fallbackGraphSearch(query: string, maxResults: number): SourceDocument[] {
  const queryLower = query.toLowerCase();

  let selected = FALLBACK_TABLE.filter(([key]) => queryLower.includes(key));

  if (selected.length === 0) {
    selected = FALLBACK_TABLE.filter(([key]) => key.split(' ').some(word => queryLower.includes(word)));
  }

  if (selected.length === 0 && AI_TOPIC_TERMS.some(term => queryLower.includes(term))) {
    selected = FALLBACK_TABLE.filter(([key]) => AI_TOPIC_BUNDLE.includes(key));
  }

  if (selected.length === 0) {
    selected = [...FALLBACK_TABLE];
  }

  const documents = selected.slice(0, Math.max(0, maxResults)).map(([, entry]) => ({
    kind: 'graph' as const,
    ...entry,
  }));

  logger.info('Using fallback graph data', { results: documents.length });
  return documents;
}
