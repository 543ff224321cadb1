export interface CLIOptions {
  dt?: number;
  maxPages?: number;
  minPageRecords?: number;
  out?: string;
  appendDedupe?: boolean;
  insecure?: boolean;
  debugDir?: string;
  verbose?: boolean;
}

export interface WalkOptions {
  maxPages: number;
  minRecordsPerPage: number;
  pageDelayMs: number;
}

export interface FetchOptions {
  baseUrl: string;
  timeout: number;
  retries: number;
  retryDelayMs: number;
  encoding: string;
  verifySsl: boolean;
}
