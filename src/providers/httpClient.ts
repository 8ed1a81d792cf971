export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export interface RequestInitLike {
  headers?: Record<string, string>;
  method?: string;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init?: RequestInitLike) => Promise<ResponseLike>;

export interface RequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpClient {
  getJson(url: string, options?: RequestOptions): Promise<unknown>;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    statusText: string,
  ) {
    super(`Request failed (${status} ${statusText}) for ${url}`);
    this.name = 'HttpError';
  }
}

export class FetchHttpClient implements HttpClient {
  constructor(private readonly fetchImpl: FetchLike) {}

  async getJson(url: string, options?: RequestOptions): Promise<unknown> {
    const requestUrl = decorateQuery(url, options?.params);
    const response = await this.fetchImpl(requestUrl, {
      method: 'GET',
      headers: { Accept: 'application/json', ...options?.headers },
      signal: options?.signal,
    });
    if (!response.ok) {
      throw new HttpError(response.status, requestUrl, response.statusText);
    }
    return response.json();
  }
}

export function decorateQuery(url: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }

  const search = Object.entries(params)
    .filter(([, value]) => value !== undefined && value !== null)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&');

  return search ? `${url}?${search}` : url;
}
