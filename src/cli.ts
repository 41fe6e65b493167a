#!/usr/bin/env node
import * as readline from 'readline';
import { logger } from './core/logger';
import { getErrorMessage } from './core/errors';
import { createRuntime } from './runtime';
import { AgentResponse } from './types';

export function renderResponse(result: AgentResponse): string {
  if (result.status === 'error') {
    return `Error [${result.error.code}]: ${result.error.message}`;
  }

  const { answer, sources, structured_output } = result.response;
  const lines = ['━'.repeat(80), 'ANSWER:', '', answer, ''];

  if (structured_output.key_points.length > 0) {
    lines.push('Key points:');
    structured_output.key_points.forEach(point => lines.push(`  • ${point}`));
    lines.push('');
  }

  lines.push(`Summary: ${structured_output.summary}`);
  lines.push(`Confidence: ${(structured_output.confidence * 100).toFixed(1)}%`);

  if (sources.length > 0) {
    lines.push('', `Sources (${sources.length}):`);
    sources.forEach((source, i) => {
      lines.push(`  ${i + 1}. [${source.type}] ${source.title} - ${source.reference} (${source.confidence.toFixed(2)})`);
    });
  }

  lines.push('━'.repeat(80));
  return lines.join('\n');
}

async function initCLI() {
  const runtime = await createRuntime();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\nHybrid retrieval CLI\n');
  console.log('Type your query or "exit" to quit\n');

  const close = async () => {
    rl.close();
    await runtime.shutdown();
    console.log('\nGoodbye!\n');
  };

  const askQuestion = () => {
    rl.question('query > ', async (input) => {
      const query = input.trim();

      if (query.toLowerCase() === 'exit') {
        await close();
        return;
      }

      if (!query) {
        askQuestion();
        return;
      }

      try {
        console.log('\nProcessing...\n');
        const result = await runtime.agent.processQuery(query);
        console.log(renderResponse(result));
        console.log('');
      } catch (error) {
        console.error('\nError:', getErrorMessage(error), '\n');
      }

      askQuestion();
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch((error) => {
    logger.error('CLI failed', { error: getErrorMessage(error) });
    process.exit(1);
  });
}
