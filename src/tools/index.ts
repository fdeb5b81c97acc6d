import type { Settings } from '../config';
import type { CompletionProvider } from '../llm';
import type { Tool } from '../types';
import { todayIso } from '../utils/dates';
import { createDateMathTool, createDateParseTool } from './date-math';
import { DateResolver } from './date-resolver';
import { createExaSearchClient, createSearchTool, type WebSearchClient } from './search';
import { createArchiveTool, createForecastTool, type FetchLike } from './weather';

export interface ToolDependencies {
  settings: Settings;
  provider: CompletionProvider;
  searchClient?: WebSearchClient;
  fetch?: FetchLike;
}

// Build all tools
export const createTools = ({
  settings,
  provider,
  searchClient,
  fetch,
}: ToolDependencies): Tool[] => {
  const resolver = new DateResolver({
    provider,
    model: settings.dateModel,
    timeoutMs: settings.requestTimeoutMs,
    today: () => todayIso(settings.timezone),
  });

  return [
    createDateMathTool(resolver),
    createDateParseTool(resolver),
    createSearchTool(searchClient ?? createExaSearchClient(settings.exaApiKey)),
    createForecastTool({ resolver, fetch }),
    createArchiveTool({ resolver, fetch }),
  ];
};

export { DateResolver } from './date-resolver';
export { createDateMathTool, createDateParseTool } from './date-math';
export { createSearchTool, createExaSearchClient } from './search';
export type { WebSearchClient } from './search';
export { createForecastTool, createArchiveTool } from './weather';
export type { FetchLike } from './weather';
