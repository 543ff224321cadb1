import https from 'node:https';
import axios, { type AxiosRequestConfig } from 'axios';
import iconv from 'iconv-lite';
import { config } from '../config/index.js';
import { FetchError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { FetchOptions, PageFetcher, PageRequest } from '../types/index.js';

export interface HttpResponse {
  status: number;
  data: ArrayBuffer | Buffer;
}

export type HttpGet = (url: string, requestConfig: AxiosRequestConfig) => Promise<HttpResponse>;

export type Sleep = (ms: number) => Promise<void>;

const defaultHttpGet: HttpGet = (url, requestConfig) => axios.get<ArrayBuffer>(url, requestConfig);

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** `dt` is only sent for past days; the current day is requested with `p` alone. */
export function buildPageParams(request: PageRequest): Record<string, string> {
  const params: Record<string, string> = { p: String(request.page) };
  if (request.daysAgo > 0) {
    params.dt = String(request.daysAgo);
  }
  return params;
}

export class FetchService implements PageFetcher {
  private readonly options: FetchOptions & { userAgent: string };
  private readonly httpsAgent: https.Agent;

  constructor(
    options: Partial<FetchOptions> = {},
    private readonly httpGet: HttpGet = defaultHttpGet,
    private readonly sleep: Sleep = defaultSleep
  ) {
    this.options = { ...config.iradio, ...options };
    this.httpsAgent = new https.Agent({ rejectUnauthorized: this.options.verifySsl });
  }

  async fetchPage(request: PageRequest): Promise<string> {
    const bytes = await this.fetchContent(buildPageParams(request));
    return iconv.decode(bytes, this.options.encoding);
  }

  /** Raw body bytes; decoding is left to the caller so a wrong charset can still be repaired. */
  async fetchContent(params: Record<string, string>): Promise<Buffer> {
    const { baseUrl, retries, retryDelayMs } = this.options;
    let lastError = 'no attempt made';

    for (let attempt = 0; attempt < retries; attempt++) {
      try {
        const response = await this.httpGet(baseUrl, this.requestConfig(params));
        const body = Buffer.isBuffer(response.data) ? response.data : Buffer.from(response.data);

        if (response.status >= 200 && response.status < 300 && body.length > 0) {
          Logger.debug('Fetched playlist page', { params, bytes: body.length, attempt });
          return body;
        }
        lastError = `HTTP ${response.status}`;
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
      }

      if (attempt < retries - 1) {
        const delay = retryDelayMs * (attempt + 1);
        Logger.warn('Page fetch failed, retrying', { params, attempt, lastError, delay });
        await this.sleep(delay);
      }
    }

    throw new FetchError(`Failed to fetch ${baseUrl}`, { params, lastError, attempts: retries });
  }

  private requestConfig(params: Record<string, string>): AxiosRequestConfig {
    return {
      params,
      headers: {
        'User-Agent': this.options.userAgent,
        'Accept-Language': 'zh-TW,zh;q=0.9,en;q=0.8',
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
      timeout: this.options.timeout,
      responseType: 'arraybuffer',
      maxRedirects: 5,
      validateStatus: () => true,
      httpsAgent: this.httpsAgent,
    };
  }
}
