import dotenv from 'dotenv';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

dotenv.config();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36';

export function createConfig(env: NodeJS.ProcessEnv = process.env): ValidatedAppConfig {
  const rawConfig = {
    iradio: {
      baseUrl: env.IRADIO_BASE_URL || 'https://www.bcc.com.tw/news3_search.asp',
      timeout: parseInt(env.IRADIO_TIMEOUT_MS || '30000', 10),
      retries: parseInt(env.IRADIO_FETCH_RETRIES || '6', 10),
      retryDelayMs: parseInt(env.IRADIO_RETRY_DELAY_MS || '1500', 10),
      encoding: env.IRADIO_ENCODING || 'utf-8',
      verifySsl: env.IRADIO_INSECURE !== 'true',
      userAgent: env.IRADIO_USER_AGENT || DEFAULT_USER_AGENT,
    },
    pagination: {
      maxPages: parseInt(env.IRADIO_MAX_PAGES || '50', 10),
      minRecordsPerPage: parseInt(env.IRADIO_MIN_PAGE_RECORDS || '5', 10),
      pageDelayMs: parseInt(env.IRADIO_PAGE_DELAY_MS || '600', 10),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    output: {
      path: env.IRADIO_OUTPUT || 'data/iradio_today.csv',
      appendDedupe: env.IRADIO_APPEND_DEDUPE === 'true',
      debugDir: env.IRADIO_DEBUG_DIR || undefined,
    },
  };

  try {
    return AppConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Invalid configuration: ${error.message}`);
    }
    throw new ConfigurationError('Unknown configuration validation error');
  }
}

export const config = createConfig();

export function printConfigSummary(): void {
  console.log('Configuration Summary:');
  console.log(`- Source URL: ${config.iradio.baseUrl}`);
  console.log(`- Page Encoding: ${config.iradio.encoding}`);
  console.log(`- Verify SSL: ${config.iradio.verifySsl ? 'YES' : 'NO'}`);
  console.log(`- Max Pages: ${config.pagination.maxPages}`);
  console.log(`- Short Page Threshold: ${config.pagination.minRecordsPerPage}`);
  console.log(`- Output: ${config.output.path}`);
  console.log(`- Log Level: ${config.logging.level}`);
}
