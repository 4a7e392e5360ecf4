import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { ClientError } from '../utils/errorHandler';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = 'wallpaper-fetcher/1.0';

export interface RequestOptions {
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

export interface HttpResponse<T> {
  status: number;
  url: string;              // Final URL after redirects
  data: T;
}

/**
 * What backends and the fetcher need from the network. Transport failures
 * reject with ClientError; HTTP statuses are left to the caller except in
 * download(), which treats anything outside 2xx as a failure.
 */
export interface HttpClient {
  readonly closed: boolean;
  getJson(url: string, options?: RequestOptions): Promise<HttpResponse<unknown>>;
  follow(url: string, options?: RequestOptions): Promise<HttpResponse<null>>;
  download(url: string, options?: RequestOptions): Promise<Buffer>;
  close(): Promise<void>;
}

export interface SessionOptions {
  timeoutMs?: number;
  userAgent?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Node's http adapter records the last hop of a redirect chain on the
 * underlying response object.
 */
function finalUrl(response: AxiosResponse, fallback: string): string {
  const request: unknown = response.request;
  if (isRecord(request) && isRecord(request.res) && typeof request.res.responseUrl === 'string') {
    return request.res.responseUrl;
  }
  return fallback;
}

export class HttpSession implements HttpClient {
  private readonly client: AxiosInstance;
  private readonly controller = new AbortController();
  private isClosed = false;

  constructor(options: SessionOptions = {}) {
    this.client = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
      maxRedirects: 10,
      validateStatus: () => true,
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  private async request<T>(url: string, config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    if (this.isClosed) {
      throw new ClientError(`Session is closed, cannot request ${url}`);
    }
    try {
      return await this.client.request<T>({
        ...config,
        url,
        method: 'GET',
        signal: this.controller.signal,
      });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new ClientError(`Request to ${url} failed: ${error.message}`, undefined, { cause: error });
      }
      throw error;
    }
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<HttpResponse<unknown>> {
    const response = await this.request<unknown>(url, {
      params: options.params,
      headers: options.headers,
      responseType: 'json',
    });
    return { status: response.status, url: finalUrl(response, url), data: response.data };
  }

  async follow(url: string, options: RequestOptions = {}): Promise<HttpResponse<null>> {
    const response = await this.request<unknown>(url, {
      params: options.params,
      headers: options.headers,
      // The body is never read, only the address it was served from
      responseType: 'stream',
    });
    const data: unknown = response.data;
    if (isRecord(data) && typeof data.destroy === 'function') {
      data.destroy();
    }
    return { status: response.status, url: finalUrl(response, url), data: null };
  }

  async download(url: string, options: RequestOptions = {}): Promise<Buffer> {
    const response = await this.request<ArrayBuffer>(url, {
      params: options.params,
      headers: options.headers,
      responseType: 'arraybuffer',
    });
    if (response.status < 200 || response.status >= 300) {
      throw new ClientError(`HTTP ${response.status} downloading ${url}`, response.status);
    }
    return Buffer.from(response.data);
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    // Cancels anything still in flight
    this.controller.abort();
  }
}
