import axios, { AxiosInstance, AxiosRequestConfig, isAxiosError } from 'axios';
import { setTimeout as sleep } from 'timers/promises';

/**
 * Options for the HTTP client
 */
export interface HttpClientOptions {
  /** Default timeout in milliseconds */
  timeout?: number;

  /** Default retry count */
  retries?: number;

  /** Default delay between retries in milliseconds */
  retryDelay?: number;

  /** Default user agent */
  userAgent?: string;

  /** Default rate limit in requests per minute and host */
  rateLimit?: number;
}

/**
 * Interface for the HTTP client
 */
export interface IHttpClient {
  /**
   * Fetch a URL with GET method
   * @param url URL to fetch
   * @param options Request options
   */
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
}

/**
 * Response from the HTTP client
 */
export interface HttpResponse {
  /** Response status code */
  statusCode: number;

  /** Response headers */
  headers: Record<string, string>;

  /** Response body as string */
  body: string;

  /** URL of the response after redirects */
  finalUrl: string;

  /** Time taken to fetch in milliseconds */
  timeTaken: number;
}

/**
 * Options for a request
 */
export interface RequestOptions {
  /** Request timeout in milliseconds */
  timeout?: number;

  /** Number of retries on failure */
  retries?: number;

  /** Delay between retries in milliseconds */
  retryDelay?: number;

  /** Custom headers */
  headers?: Record<string, string>;

  /** Aborts the request and any pending retry */
  signal?: AbortSignal;
}

type ResolvedOptions = Required<HttpClientOptions>;

function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      flat[name] = value;
    } else if (Array.isArray(value)) {
      flat[name] = value.join(', ');
    } else if (typeof value === 'number') {
      flat[name] = String(value);
    }
  }
  return flat;
}

/**
 * Implementation of the HTTP client
 */
export class HttpClient implements IHttpClient {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<string, RateLimiter> = new Map();
  private defaultOptions: ResolvedOptions;

  /**
   * Create a new HTTP client
   * @param options Options for the HTTP client
   */
  constructor(options: HttpClientOptions = {}) {
    this.defaultOptions = {
      timeout: 10000,
      retries: 3,
      retryDelay: 1000,
      userAgent: 'docs-librarian/1.0',
      rateLimit: 120,
      ...options
    };

    this.axiosInstance = axios.create({
      timeout: this.defaultOptions.timeout,
      headers: {
        'User-Agent': this.defaultOptions.userAgent
      }
    });
  }

  /**
   * Fetch a URL with GET method.
   * Network errors and 5xx responses are retried; other statuses are
   * returned as they are.
   * @param url URL to fetch
   * @param options Request options
   */
  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const retries = options.retries ?? this.defaultOptions.retries;
    const retryDelay = options.retryDelay ?? this.defaultOptions.retryDelay;

    const limiter = this.getRateLimiter(new URL(url).host, 60000 / this.defaultOptions.rateLimit);

    const config: AxiosRequestConfig<string> = {
      timeout: options.timeout ?? this.defaultOptions.timeout,
      headers: {
        'User-Agent': this.defaultOptions.userAgent,
        ...options.headers
      },
      responseType: 'text',
      signal: options.signal,
      validateStatus: () => true, // Don't throw on any status code
      maxRedirects: 10
    };

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= retries; attempt++) {
      options.signal?.throwIfAborted();
      await limiter.waitForNextSlot(options.signal);
      try {
        const startTime = Date.now();
        const response = await this.axiosInstance.get<string>(url, config);
        const timeTaken = Date.now() - startTime;

        if (response.status >= 500 && attempt < retries) {
          lastError = new Error(`HTTP ${response.status} from ${url}`);
        } else {
          const finalUrl: unknown = response.request?.res?.responseUrl;
          return {
            statusCode: response.status,
            headers: flattenHeaders(response.headers),
            body: String(response.data),
            finalUrl: typeof finalUrl === 'string' ? finalUrl : url,
            timeTaken
          };
        }
      } catch (error: unknown) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (options.signal?.aborted || (isAxiosError(error) && error.code === 'ERR_CANCELED')) {
          break;
        }
      }

      if (attempt < retries && retryDelay > 0) {
        await sleep(retryDelay, undefined, { signal: options.signal });
      }
    }

    throw lastError || new Error(`Failed to fetch ${url}`);
  }

  /**
   * Get or create a rate limiter for a host
   * @param host Host to get rate limiter for
   * @param delay Delay between requests in milliseconds
   */
  private getRateLimiter(host: string, delay: number): RateLimiter {
    let limiter = this.rateLimiters.get(host);

    if (!limiter) {
      limiter = new RateLimiter(delay);
      this.rateLimiters.set(host, limiter);
    } else {
      limiter.setDelay(delay);
    }

    return limiter;
  }
}

/**
 * Rate limiter for a host
 */
class RateLimiter {
  private lastRequestTime: number = 0;
  private delay: number;

  constructor(delay: number) {
    this.delay = delay;
  }

  setDelay(delay: number): void {
    this.delay = delay;
  }

  /**
   * Wait for the next available slot; rejects as soon as the signal aborts
   */
  async waitForNextSlot(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const nextSlot = this.lastRequestTime + this.delay;

    if (now < nextSlot) {
      this.lastRequestTime = nextSlot;
      await sleep(nextSlot - now, undefined, { signal });
      return;
    }

    this.lastRequestTime = now;
  }
}
