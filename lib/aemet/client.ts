import { load } from 'cheerio';
import * as iconv from 'iconv-lite';
import { fetch, type Response } from 'undici';
import { SourceRequestError } from './errors';
import type { StationConfig } from './types';

export type ClientConfig = Pick<StationConfig, 'sourceUrl' | 'userAgent' | 'timeoutMs'>;

const CSV_HREF = /\.csv(\?|$)/i;

export class ObservationClient {
  private readonly config: ClientConfig;

  constructor(config: ClientConfig) {
    this.config = config;
  }

  get pageUrl(): string {
    return this.config.sourceUrl;
  }

  async fetchPage(): Promise<string> {
    const body = await this.get(this.config.sourceUrl, 'text/html,application/xhtml+xml');
    return decodeBody(body);
  }

  async fetchCsv(url: string): Promise<string> {
    const body = await this.get(url, 'text/csv,text/plain,*/*');
    return decodeBody(body);
  }

  private async get(url: string, accept: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'user-agent': this.config.userAgent,
          accept
        },
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceRequestError(`Request failed for ${url} (${reason})`, { url, cause: error });
    }

    if (!response.ok) {
      throw new SourceRequestError(`Request failed for ${url} (${response.status} ${response.statusText})`, {
        url,
        status: response.status
      });
    }
    return Buffer.from(await response.arrayBuffer());
  }
}

export function findCsvLink(html: string, baseUrl: string): string | null {
  const $ = load(html);
  const href = $('a[href]')
    .map((_, element) => $(element).attr('href') ?? '')
    .get()
    .find((candidate) => CSV_HREF.test(candidate.trim()));
  if (!href) return null;
  try {
    return new URL(href.trim(), baseUrl).toString();
  } catch {
    return null;
  }
}

/** Strict UTF-8 first; provider downloads have also shipped as Windows-1252. */
export function decodeBody(body: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(body);
  } catch {
    return iconv.decode(body, 'win1252');
  }
}
