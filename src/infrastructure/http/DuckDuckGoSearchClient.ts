import fetch from 'node-fetch';
import { z } from 'zod';
import { BackendInvocationError } from '../../core/errors.js';
import { ISearchTool } from '../../core/interfaces/ISearchTool.js';
import { BackendResult, fail, ok } from '../../core/result.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { RetryConfig, isRetryableError, withRetry } from '../../utils/retry.js';
import { FetchFn } from './OllamaApiClient.js';

const TopicSchema = z
  .object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(z.object({ Text: z.string().optional(), FirstURL: z.string().optional() })).optional(),
  })
  .passthrough();

const InstantAnswerSchema = z
  .object({
    Heading: z.string().optional().default(''),
    AbstractText: z.string().optional().default(''),
    AbstractURL: z.string().optional().default(''),
    Answer: z.union([z.string(), z.number()]).optional(),
    Definition: z.string().optional().default(''),
    RelatedTopics: z.array(TopicSchema).optional().default([]),
  })
  .passthrough();

const SEARCH_RETRY: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 500,
  maxDelayMs: 2000,
  multiplier: 2,
  timeoutMs: 15000,
  shouldRetry: isRetryableError,
};

/**
 * Internet search through the DuckDuckGo Instant Answer API
 */
export class DuckDuckGoSearchClient implements ISearchTool {
  readonly name = 'internet_search';
  readonly description =
    'Search the internet for current and real-time information. Use this for current events, ' +
    'recent news, real-time data (stock prices, weather, sports scores), information that ' +
    'changes frequently, and factual verification of recent claims.';

  private fetchFn: FetchFn;
  private logger: Logger;
  private baseUrl: string;
  private maxResults: number;

  constructor(
    options: {
      baseUrl?: string;
      maxResults?: number;
      fetchFn?: FetchFn;
      logger?: Logger;
    } = {}
  ) {
    this.baseUrl = (options.baseUrl ?? 'https://api.duckduckgo.com').replace(/\/+$/, '');
    this.maxResults = options.maxResults ?? 5;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async search(query: string): Promise<BackendResult<string>> {
    const trimmed = query.trim();
    if (!trimmed) {
      return fail(new BackendInvocationError('Search query must not be empty', this.name));
    }

    try {
      const url = `${this.baseUrl}/?q=${encodeURIComponent(trimmed)}&format=json&no_html=1&skip_disambig=1`;
      const response = await withRetry(async () => {
        const res = await this.fetchFn(url, { method: 'GET', headers: { Accept: 'application/json' } });
        if (!res.ok) throw new Error(`HTTP error! status: ${res.status}`);
        return res;
      }, SEARCH_RETRY);

      const data = InstantAnswerSchema.parse(await response.json());
      const summary = this.format(trimmed, data);
      this.logger.debug(`Search "${trimmed}" returned ${summary.length} chars`);
      return ok(summary);
    } catch (error) {
      return fail(BackendInvocationError.from(error, this.name));
    }
  }

  private format(query: string, data: z.infer<typeof InstantAnswerSchema>): string {
    const lines: string[] = [];

    if (data.Answer !== undefined && String(data.Answer).length > 0) {
      lines.push(`Answer: ${data.Answer}`);
    }
    if (data.AbstractText) {
      const source = data.AbstractURL ? ` (${data.AbstractURL})` : '';
      lines.push(`${data.Heading ? `${data.Heading}: ` : ''}${data.AbstractText}${source}`);
    }
    if (data.Definition) {
      lines.push(`Definition: ${data.Definition}`);
    }

    const topics = data.RelatedTopics.flatMap((topic) => (topic.Topics ? topic.Topics : [topic]));
    for (const topic of topics.slice(0, this.maxResults)) {
      if (topic.Text) {
        lines.push(`- ${topic.Text}${topic.FirstURL ? ` (${topic.FirstURL})` : ''}`);
      }
    }

    return lines.length > 0 ? lines.join('\n') : `No results found for "${query}".`;
  }
}
