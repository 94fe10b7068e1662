/**
 * ADK FunctionTool Wrappers
 *
 * Exposes the Tavily search function to LlmAgents as an ADK FunctionTool
 * with a Zod parameter schema.
 */
import { FunctionTool, type BaseTool } from '@google/adk';
import { z } from 'zod';
import type { SearchFunction } from './tavily-search.js';

export const TAVILY_SEARCH_TOOL_NAME = 'tavily_search';

export function createTavilySearchAdkTool(search: SearchFunction): BaseTool {
  return new FunctionTool({
    name: TAVILY_SEARCH_TOOL_NAME,
    description:
      'Searches the web with Tavily. Returns titles, links, snippets and page content for the query.',
    parameters: z.object({
      query: z.string().describe('The search query string'),
    }),
    execute: async ({ query }) => {
      const result = await search(query);
      return { result };
    },
  });
}
