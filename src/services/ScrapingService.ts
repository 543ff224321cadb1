import Bottleneck from 'bottleneck';
import dayjs from 'dayjs';
import { config } from '../config/index.js';
import { EmptyPageError, LayoutNotRecognizedError } from '../types/errors.js';
import { PageParser } from '../parsing/index.js';
import { referenceDateFor } from '../utils/dates.js';
import { Logger } from '../utils/logger.js';
import type {
  PageFetcher,
  PageObserver,
  PageRequest,
  PlaybackRecord,
  ScrapeStats,
  WalkOptions,
} from '../types/index.js';

export interface ScrapeResult {
  records: PlaybackRecord[];
  stats: ScrapeStats;
}

export class ScrapingService {
  private limiter: Bottleneck;
  private readonly options: WalkOptions;

  constructor(
    private readonly fetcher: PageFetcher,
    options: Partial<WalkOptions> = {},
    private readonly observer?: PageObserver,
    private readonly now: () => dayjs.Dayjs = () => dayjs()
  ) {
    this.options = { ...config.pagination, ...options };
    this.limiter = new Bottleneck({ minTime: this.options.pageDelayMs, maxConcurrent: 1 });
  }

  /**
   * Walks the pages of one day's log until a page comes back empty or unreadable, a page is short
   * (fewer than `minRecordsPerPage` records, taken as the last page) or `maxPages` is reached.
   */
  async scrapeDay(daysAgo: number): Promise<ScrapeResult> {
    const referenceDate = referenceDateFor(daysAgo, this.now());
    const { maxPages, minRecordsPerPage } = this.options;
    const records: PlaybackRecord[] = [];
    let stopReason: ScrapeStats['stopReason'] = 'page-limit';
    let pagesFetched = 0;

    Logger.info(`Scraping playback log for ${referenceDate}`, { daysAgo, maxPages });

    for (let page = 1; page <= maxPages; page++) {
      let batch: PlaybackRecord[];
      try {
        batch = await this.scrapePage({ page, daysAgo }, referenceDate);
      } catch (error) {
        if (page === 1 || !(error instanceof LayoutNotRecognizedError)) {
          throw error;
        }
        Logger.warn('Page layout not recognized, treating it as the end of the log', {
          page,
          tokens: error.tokens.length,
        });
        pagesFetched++;
        stopReason = 'empty-page';
        break;
      }
      pagesFetched++;

      if (!batch.length) {
        if (page === 1) {
          throw new EmptyPageError(page, { daysAgo, referenceDate });
        }
        stopReason = 'empty-page';
        break;
      }

      records.push(...batch);

      if (batch.length < minRecordsPerPage) {
        Logger.debug('Short page, assuming it is the last one', {
          page,
          records: batch.length,
          minRecordsPerPage,
        });
        stopReason = 'short-page';
        break;
      }
    }

    Logger.info(`Scraped ${records.length} records from ${pagesFetched} pages`, { stopReason });
    return { records, stats: { pagesFetched, records: records.length, stopReason } };
  }

  async scrapePage(request: PageRequest, referenceDate: string): Promise<PlaybackRecord[]> {
    const content = await this.limiter.schedule(() => this.fetcher.fetchPage(request));
    if (this.observer) {
      await this.observer(request, content);
    }

    const { detection, entries, tokens } = PageParser.parse(content, referenceDate);
    const retrievedAt = this.now().format('YYYY-MM-DD[T]HH:mm:ss');

    Logger.debug(`Parsed page ${request.page}`, {
      layout: detection.layout,
      source: detection.source,
      tokens: tokens.length,
      records: entries.length,
    });

    if (entries.length > 0) {
      const first = entries[0];
      Logger.debug('First record on page', {
        page: request.page,
        record: `${first.date} ${first.time} ${first.performer} - ${first.song}`,
      });
    }

    return entries.map((entry) => ({
      ...entry,
      pageNumber: request.page,
      daysAgo: request.daysAgo,
      retrievedAt,
    }));
  }
}
