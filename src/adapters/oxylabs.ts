import { AxiosInstance, AxiosResponse } from 'axios';
import { SerpRequestError } from '../core/errors';
import { SerpOptions, SerpResultPage, SerpSearchClient, SerpSearchRequest, SerpSearchResponse } from '../core/types';
import { DEFAULT_SERP_ENDPOINT } from '../utils/config';
import { createHttpClient, describeHttpError } from '../utils/httpClient';

export interface OxylabsCredentials {
  username: string;
  password: string;
}

export interface OxylabsClientOptions {
  endpoint?: string;
  timeoutMs?: number;
  proxy?: string;
  http?: AxiosInstance;
}

interface OxylabsContextEntry {
  key: string;
  value: string | number | boolean;
}

export interface OxylabsPayload {
  source: 'google_search';
  query: string;
  start_page: number;
  pages: number;
  locale: string;
  user_agent_type: string;
  parse: boolean;
  limit: number;
  context: OxylabsContextEntry[];
}

const MAX_ERROR_BODY = 2000;

export const buildPayload = (request: SerpSearchRequest): OxylabsPayload => {
  const options: SerpOptions = request.options;
  return {
    source: 'google_search',
    query: request.text,
    start_page: request.startPage,
    pages: request.pagesPerRun,
    locale: options.locale,
    user_agent_type: options.userAgentType,
    parse: options.parse,
    limit: options.limit,
    context: [
      { key: 'filter', value: options.similarResultsFilter ? 1 : 0 },
      { key: 'results_language', value: options.resultsLanguage },
      { key: 'safe_search', value: options.safeSearch },
      { key: 'nfpr', value: options.noFalsePositiveRewrite },
    ],
  };
};

const stringifyBody = (data: unknown): string => {
  const text = typeof data === 'string' ? data : JSON.stringify(data ?? '');
  return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...` : text;
};

const readResults = (data: unknown): SerpResultPage[] | null => {
  if (!data || typeof data !== 'object' || !('results' in data)) return null;
  const { results } = data;
  return Array.isArray(results) ? results.filter((page): page is SerpResultPage => !!page && typeof page === 'object') : null;
};

export class OxylabsSerpClient implements SerpSearchClient {
  private readonly http: AxiosInstance;
  private readonly endpoint: string;

  constructor(private readonly credentials: OxylabsCredentials, options: OxylabsClientOptions = {}) {
    this.endpoint = options.endpoint || DEFAULT_SERP_ENDPOINT;
    this.http = options.http ?? createHttpClient(options.proxy, options.timeoutMs ?? 180000);
  }

  async search(request: SerpSearchRequest, signal?: AbortSignal): Promise<SerpSearchResponse> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.endpoint, buildPayload(request), {
        auth: { username: this.credentials.username, password: this.credentials.password },
        validateStatus: () => true,
        signal,
      });
    } catch (error) {
      throw new SerpRequestError(`serp request failed: ${describeHttpError(error)}`, 'transport');
    }

    if (response.status < 200 || response.status >= 300) {
      throw new SerpRequestError(`serp api responded with status ${response.status}`, 'status', response.status, stringifyBody(response.data));
    }

    const results = readResults(response.data);
    if (!results) {
      throw new SerpRequestError('serp api response has no results array', 'malformed', response.status, stringifyBody(response.data));
    }
    return { results };
  }
}
