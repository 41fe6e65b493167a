import { SourceDocument } from '../types';

export const RESPONSE_TEMPLATES = {
  CONTEXT_BLOCK: (documents: readonly SourceDocument[]) => {
    let context = '';
    documents.forEach((document, i) => {
      context += `\n--- Source ${i + 1} (${document.kind}) ---\n`;
      context += `Title: ${document.title}\n`;
      context += `Content: ${document.content}\n`;
    });
    return context;
  },

  ANSWER_PROMPT: (query: string, context: string) => {
    return `Based on the following information, provide a comprehensive answer to the query.

QUERY: ${query}

INFORMATION:
${context}

Please provide:
1. A clear main answer
2. 3-5 key points
3. A brief summary

Format as JSON:
{
    "answer": "your answer",
    "key_points": ["point1", "point2", "point3"],
    "summary": "brief summary"
}`;
  },

  FALLBACK_ANSWER: (total: number, graph: number, internet: number) =>
    `I found information about your query from ${total} sources ` +
    `(${graph} from knowledge graph, ${internet} from web search). ` +
    `Configure LLM for detailed AI responses.`,

  FALLBACK_KEY_POINTS: (graph: number, internet: number) => [
    `Graph sources: ${graph}`,
    `Internet sources: ${internet}`,
    'Fallback mode active',
    'LLM not configured',
  ],

  FALLBACK_SUMMARY: (total: number) => `Found ${total} information sources`,

  INSUFFICIENT_ANSWER: "I couldn't find enough relevant information to answer your question.",
  INSUFFICIENT_KEY_POINTS: ['No information found'],
  INSUFFICIENT_SUMMARY: 'Unable to generate answer due to insufficient information',

  RAW_TEXT_KEY_POINT: 'See main answer for details',
};
