import Exa from 'exa-js';
import { z } from 'zod';
import type { SearchResultItem, Tool } from '../types';

const DEFAULT_RESULTS = 5;
const MAX_RESULTS = 10;

export interface WebSearchClient {
  search(query: string, numberOfResults: number): Promise<SearchResultItem[]>;
}

// Exa.ai search client
export const createExaSearchClient = (
  apiKey: string | undefined,
): WebSearchClient => ({
  async search(query, numberOfResults) {
    if (!apiKey) {
      throw new Error('Missing environment variable: EXA_API_KEY');
    }
    const exa = new Exa(apiKey);
    const { results } = await exa.searchAndContents(query, {
      type: 'neural',
      numResults: numberOfResults,
      text: true,
    });

    return results.map((result) => ({
      title: result.title ?? null,
      url: result.url,
      content:
        'text' in result && typeof result.text === 'string' ? result.text : null,
      score: result.score ?? null,
    }));
  },
});

export const webSearchSchema = z.object({
  query: z.string().min(1).describe('The search query'),
  max_results: z
    .number()
    .int()
    .optional()
    .describe('The number of results to return (1-10)'),
});

export const createSearchTool = (client: WebSearchClient): Tool => ({
  name: 'web_search',
  description: 'Search the web to get latest information on any topic.',
  argsSchema: webSearchSchema,
  execute: async (args) => {
    const { query, max_results: requested } = webSearchSchema.parse(args);
    const numberOfResults = Math.max(
      1,
      Math.min(MAX_RESULTS, requested ?? DEFAULT_RESULTS),
    );
    const results = await client.search(query, numberOfResults);
    return { query, results };
  },
});
