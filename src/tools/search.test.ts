import { describe, it, expect, vi } from 'vitest';
import type { SearchResultItem } from '../types';
import { createExaSearchClient, createSearchTool, type WebSearchClient } from './search';

const RESULT: SearchResultItem = {
  title: 'Release notes',
  url: 'https://example.com/notes',
  content: 'What changed this week',
  score: 0.92,
};

const makeClient = () => {
  const search = vi.fn<WebSearchClient['search']>().mockResolvedValue([RESULT]);
  return { search };
};

describe('web_search', () => {
  it('returns the query with its results', async () => {
    const client = makeClient();
    const tool = createSearchTool(client);

    await expect(tool.execute({ query: 'release notes' })).resolves.toEqual({
      query: 'release notes',
      results: [RESULT],
    });
    expect(client.search).toHaveBeenCalledWith('release notes', 5);
  });

  it('clamps the number of results', async () => {
    const client = makeClient();
    const tool = createSearchTool(client);

    await tool.execute({ query: 'a', max_results: 15 });
    await tool.execute({ query: 'b', max_results: 0 });

    expect(client.search.mock.calls).toEqual([
      ['a', 10],
      ['b', 1],
    ]);
  });

  it('rejects an empty query', async () => {
    const tool = createSearchTool(makeClient());

    await expect(tool.execute({ query: '' })).rejects.toThrow();
  });

  it('needs an API key to reach the search service', async () => {
    await expect(createExaSearchClient(undefined).search('x', 1)).rejects.toThrow(
      'Missing environment variable: EXA_API_KEY',
    );
  });
});
