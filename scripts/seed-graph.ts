import neo4j from 'neo4j-driver';
import { config } from '../src/core/config';
import { logger } from '../src/core/logger';
import { getErrorMessage } from '../src/core/errors';
import fallbackKnowledge from '../src/data/fallback-knowledge.json';

const RELATIONSHIPS: Array<[string, string, string]> = [
  ['Machine Learning', 'SUBFIELD_OF', 'Artificial Intelligence'],
  ['Deep Learning', 'SUBFIELD_OF', 'Machine Learning'],
  ['Deep Learning', 'USES', 'Neural Networks'],
  ['Natural Language Processing', 'SUBFIELD_OF', 'Artificial Intelligence'],
  ['Computer Vision', 'SUBFIELD_OF', 'Artificial Intelligence'],
  ['Computer Vision', 'USES', 'Deep Learning'],
];

/**
 * Creates the Concept constraint and loads the built-in concepts so a fresh
 * database answers the same topics as the fallback table.
 */
async function seed() {
  logger.info('Seeding knowledge graph...');

  const driver = neo4j.driver(
    config.neo4j.uri,
    neo4j.auth.basic(config.neo4j.username, config.neo4j.password)
  );
  const session = driver.session();

  try {
    await session.run('CREATE CONSTRAINT concept_id IF NOT EXISTS FOR (c:Concept) REQUIRE c.id IS UNIQUE');

    for (const [key, entry] of Object.entries(fallbackKnowledge)) {
      await session.run(
        `MERGE (c:Concept {id: $id})
         SET c.title = $title, c.summary = $summary, c.category = $category,
             c.confidence = $confidence, c.keyword = $keyword`,
        {
          id: entry.reference.replace('graph:fallback:', ''),
          title: entry.title,
          summary: entry.content,
          category: entry.category,
          confidence: entry.confidence,
          keyword: key,
        }
      );
    }

    for (const [from, relation, to] of RELATIONSHIPS) {
      await session.run(
        `MATCH (a:Concept {title: $from}), (b:Concept {title: $to})
         MERGE (a)-[r:${relation}]->(b)
         SET r.confidence = 0.8`,
        { from, to }
      );
    }

    logger.info('Knowledge graph seeded', {
      concepts: Object.keys(fallbackKnowledge).length,
      relationships: RELATIONSHIPS.length,
    });
  } finally {
    await session.close();
    await driver.close();
  }
}

seed().catch((error) => {
  logger.error('Seeding failed', { error: getErrorMessage(error) });
  process.exit(1);
});
