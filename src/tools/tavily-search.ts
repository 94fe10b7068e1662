/**
 * Tavily Search Tool
 *
 * Web search through the Tavily API. Returns numbered results with title,
 * link, snippet and (optionally) the page's raw content, formatted as plain
 * text for the research agent. The API key is required when the search
 * function is created; request failures are reported back to the model as
 * an "Error: ..." string rather than thrown.
 */
import { z } from 'zod';
import type { TavilySearchOptions } from '../config/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { agentLogger, errorMessage } from '../utils/logger.js';

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';
const TAVILY_HELP_URL = 'https://tavily.com';

const TavilyResultSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  content: z.string().nullish(),
  raw_content: z.string().nullish(),
  score: z.number().nullish(),
});

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(TavilyResultSchema).default([]),
});

export type TavilyResult = z.infer<typeof TavilyResultSchema>;

export type SearchFunction = (query: string) => Promise<string>;

export const DEFAULT_SEARCH_OPTIONS: Omit<TavilySearchOptions, 'apiKey'> = {
  maxResults: 10,
  searchDepth: 'advanced',
  includeAnswer: false,
  includeRawContent: true,
  includeImages: false,
  maxContentLength: 4000,
};

export function createTavilySearch(
  options: Partial<TavilySearchOptions> = {}
): SearchFunction {
  const apiKey = options.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError(
      'TAVILY_API_KEY is not set. Get a key from https://tavily.com and export TAVILY_API_KEY.',
      'TAVILY_API_KEY',
      TAVILY_HELP_URL
    );
  }

  const settings = { ...DEFAULT_SEARCH_OPTIONS, ...options };

  return async (query: string): Promise<string> => {
    try {
      const response = await fetch(TAVILY_SEARCH_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: settings.maxResults,
          search_depth: settings.searchDepth,
          include_answer: settings.includeAnswer,
          include_raw_content: settings.includeRawContent,
          include_images: settings.includeImages,
        }),
      });

      if (!response.ok) {
        agentLogger.warn({ status: response.status, query }, '[Tavily] Search request failed');
        return `Error: Search API returned ${response.status}`;
      }

      const parsed = TavilyResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        agentLogger.warn({ issues: parsed.error.issues, query }, '[Tavily] Unexpected response');
        return 'Error: Search API returned an unexpected response';
      }

      agentLogger.debug(`[Tavily] "${query}" returned ${parsed.data.results.length} results`);
      return formatSearchResults(parsed.data.results, {
        answer: settings.includeAnswer ? parsed.data.answer ?? undefined : undefined,
        maxContentLength: settings.maxContentLength,
      });
    } catch (error) {
      const message = errorMessage(error);
      agentLogger.warn({ error: message, query }, '[Tavily] Search threw');
      return `Error performing search: ${message}`;
    }
  };
}

export function formatSearchResults(
  results: TavilyResult[],
  { answer, maxContentLength }: { answer?: string; maxContentLength: number }
): string {
  if (results.length === 0) {
    return 'No results found.';
  }

  const summary = results.map((result, i) => {
    const lines = [
      `${i + 1}. ${result.title ?? 'No Title'}`,
      `   Link: ${result.url ?? ''}`,
      `   Snippet: ${result.content ?? ''}`,
    ];
    const raw = result.raw_content?.trim();
    if (raw) {
      lines.push(`   Content: ${truncate(raw, maxContentLength)}`);
    }
    return lines.join('\n');
  });

  const body = summary.join('\n\n');
  return answer ? `Answer: ${answer}\n\n${body}` : body;
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.substring(0, maxLength)} [Content truncated...]`;
}
