import { promises as fs } from 'fs';
import * as path from 'path';
import { decorateQuery, type HttpClient, HttpError, type RequestOptions } from './httpClient';

export interface FixtureHttpClientOptions {
  fixtures: Record<string, string>;
  defaultFixture?: string;
  rootDir?: string;
}

/**
 * Serves JSON files from disk in place of a live KYB backend. Fixture keys are
 * request URLs (query string included, parameters sorted); a missing key falls
 * back to the bare URL, then to `defaultFixture`, then to a 404.
 */
export class LocalFixtureHttpClient implements HttpClient {
  private readonly fixtures: Map<string, string>;
  private readonly defaultFixture?: string;
  private readonly rootDir: string;
  private readonly requests: Array<{ url: string; headers: Record<string, string> }> = [];

  constructor(options: FixtureHttpClientOptions) {
    this.fixtures = new Map(Object.entries(options.fixtures));
    this.defaultFixture = options.defaultFixture;
    this.rootDir = options.rootDir ?? process.cwd();
  }

  async getJson(url: string, options?: RequestOptions): Promise<unknown> {
    const fileContents = await this.readFixture(url, options);
    return JSON.parse(fileContents);
  }

  requestLog(): ReadonlyArray<{ url: string; headers: Record<string, string> }> {
    return this.requests;
  }

  private async readFixture(url: string, options?: RequestOptions): Promise<string> {
    options?.signal?.throwIfAborted();
    const key = decorateQuery(url, options?.params);
    this.requests.push({ url: key, headers: { ...options?.headers } });

    const filePath = this.fixtures.get(key) ?? this.fixtures.get(url) ?? this.defaultFixture;
    if (!filePath) {
      throw new HttpError(404, key, 'No fixture registered');
    }

    const resolved = path.isAbsolute(filePath) ? filePath : path.join(this.rootDir, filePath);
    return fs.readFile(resolved, 'utf-8');
  }
}
