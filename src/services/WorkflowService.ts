import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ArchiveService } from './ArchiveService.js';
import { FetchService } from './FetchService.js';
import { ScrapingService } from './ScrapingService.js';
import { Logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { config } from '../config/index.js';
import { LayoutNotRecognizedError } from '../types/errors.js';
import type { CLIOptions, PageFetcher, PageObserver, ScrapeStats } from '../types/index.js';

export interface RunSummary {
  outputPath: string;
  scraped: number;
  written: number;
  stats: ScrapeStats;
}

export class WorkflowService {
  private archiveService: ArchiveService;

  constructor(
    private readonly options: CLIOptions = {},
    private readonly fetcher: PageFetcher = new FetchService(
      options.insecure ? { verifySsl: false } : {}
    )
  ) {
    this.archiveService = new ArchiveService();
  }

  private get debugDir(): string | undefined {
    return this.options.debugDir ?? config.output.debugDir;
  }

  async run(): Promise<RunSummary> {
    const daysAgo = this.options.dt ?? 0;
    const outputPath = this.options.out ?? config.output.path;
    const appendDedupe = this.options.appendDedupe ?? config.output.appendDedupe;

    Logger.info('📻 Starting playback log scrape', { daysAgo, outputPath, appendDedupe });

    try {
      const scraper = new ScrapingService(
        this.fetcher,
        {
          ...(this.options.maxPages !== undefined && { maxPages: this.options.maxPages }),
          ...(this.options.minPageRecords !== undefined && {
            minRecordsPerPage: this.options.minPageRecords,
          }),
        },
        this.pageObserver()
      );

      const { records, stats } = await scraper.scrapeDay(daysAgo);

      const written = await this.archiveService.save(outputPath, records, appendDedupe);
      Logger.info(`💾 Saved ${outputPath}`, { scraped: records.length, rows: written });

      return { outputPath, scraped: records.length, written, stats };
    } catch (error) {
      await this.dumpFailure(error);
      throw error;
    }
  }

  private pageObserver(): PageObserver | undefined {
    const dir = this.debugDir;
    if (!dir) return undefined;

    return async (_request, content) => {
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, 'last-page.html'), content, 'utf8');
    };
  }

  private async dumpFailure(error: unknown): Promise<void> {
    const dir = this.debugDir;
    if (!dir) return;

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, 'error.txt'), ErrorHandler.describe(error), 'utf8');

      if (error instanceof LayoutNotRecognizedError) {
        await writeFile(join(dir, 'layout-error.html'), error.content, 'utf8');
        await writeFile(join(dir, 'tokens.txt'), error.tokens.join('\n'), 'utf8');
      }
      Logger.info(`Debug artifacts written to ${dir}`);
    } catch (dumpError) {
      Logger.warn('Could not write debug artifacts', {
        dir,
        error: dumpError instanceof Error ? dumpError.message : String(dumpError),
      });
    }
  }
}
