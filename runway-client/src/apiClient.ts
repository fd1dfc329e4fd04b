import { loadRuntimeConfig, DEFAULT_BASE_URL } from './config.js';
import {
  ConfigurationError,
  ResponseFormatError,
  TransportError,
  UnsupportedMethodError
} from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import type { RequestPayload } from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

const SUPPORTED_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE'];

function toHttpMethod(method: string): HttpMethod | null {
  const upper = method.toUpperCase();
  return SUPPORTED_METHODS.find((supported) => supported === upper) ?? null;
}

export interface RunwayApiClientOptions {
  apiKey?: string;
  baseUrl?: string;
  logger?: Logger;
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export class RunwayApiClient {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RunwayApiClientOptions = {}) {
    this.logger = options.logger ?? rootLogger.child({ module: 'api-client' });
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));

    if (options.apiKey) {
      this.apiKey = options.apiKey;
      this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    } else {
      const config = loadRuntimeConfig(options.env);
      if (!config.RUNWAYML_API_SECRET) {
        throw new ConfigurationError(
          'No API key provided. Either pass apiKey or set the RUNWAYML_API_SECRET environment variable.'
        );
      }
      this.apiKey = config.RUNWAYML_API_SECRET;
      this.baseUrl = options.baseUrl ?? config.RUNWAYML_BASE_URL;
    }

    this.logger.info({ baseUrl: this.baseUrl }, 'RunwayApiClient initialized');
  }

  getHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
      Accept: 'application/json'
    };
  }

  /**
   * Sends one request to the API and returns the parsed JSON body.
   *
   * GET sends `data` as query parameters; the other methods send it as a JSON body.
   * Non-2xx responses reject with a TransportError holding the status and raw body.
   */
  async request(
    method: string,
    endpoint: string,
    data?: RequestPayload,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const httpMethod = toHttpMethod(method);
    if (!httpMethod) {
      throw new UnsupportedMethodError(method);
    }

    let url = `${this.baseUrl}/${endpoint.replace(/^\/+/, '')}`;
    let body: string | undefined;

    if (httpMethod === 'GET') {
      const query = toQueryString(data);
      if (query) {
        url += `?${query}`;
      }
    } else if (data !== undefined) {
      body = JSON.stringify(data);
    }

    this.logger.info({ method: httpMethod, endpoint }, 'Making API request');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: httpMethod,
        headers: this.getHeaders(),
        body,
        signal: options.signal
      });
    } catch (error) {
      this.logger.error({ error, method: httpMethod, endpoint }, 'API request failed');
      throw error;
    }

    const text = await response.text();

    if (!response.ok) {
      this.logger.error(
        { method: httpMethod, endpoint, status: response.status, body: text },
        'API request failed'
      );
      throw new TransportError(
        `${httpMethod} ${endpoint} failed with status ${response.status}`,
        response.status,
        text
      );
    }

    if (!text.trim()) {
      return {};
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      this.logger.error({ error, endpoint, status: response.status, body: text }, 'Response is not valid JSON');
      throw new ResponseFormatError(
        `${httpMethod} ${endpoint} returned a body that is not valid JSON`,
        text,
        response.status
      );
    }
  }

  async checkApiStatus(): Promise<boolean> {
    try {
      await this.request('GET', '/organization');
      return true;
    } catch (error) {
      this.logger.warn({ error }, 'API status check failed');
      return false;
    }
  }
}

function toQueryString(data?: RequestPayload): string {
  if (!data) {
    return '';
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined || value === null) continue;
    params.append(key, typeof value === 'object' ? JSON.stringify(value) : String(value));
  }
  return params.toString();
}
