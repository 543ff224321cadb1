/**
 * Known arrangements of the playback log page.
 *
 * - `with-date`: date, time, song and performer columns, optional trailing columns
 * - `without-date`: time, song and performer; every row belongs to the reference date
 * - `headerless`: no header labels; layout inferred from token shape
 */
export type Layout = 'with-date' | 'without-date' | 'headerless';

export interface LayoutDetection {
  layout: Layout;
  /** Index of the first token after the header run. */
  dataStart: number;
  source: 'header' | 'inferred';
}

export interface PlaybackEntry {
  date: string;
  /** The `MM/DD` token the date was resolved from; empty when the row carries none. */
  sourceDate: string;
  time: string;
  song: string;
  performer: string;
  album: string;
  publisher: string;
  catalogNumber: string;
}

export interface PlaybackRecord extends PlaybackEntry {
  pageNumber: number;
  daysAgo: number;
  retrievedAt: string;
}

export interface ScanState {
  cursor: number;
  /** Rolling date applied to records that carry no date token of their own. */
  currentDate: string;
}

export type ScanStep =
  | { kind: 'skip'; state: ScanState }
  | { kind: 'record'; state: ScanState; entry: PlaybackEntry }
  | { kind: 'end' };

export interface PageRequest {
  page: number;
  daysAgo: number;
}

export interface PageFetcher {
  fetchPage(request: PageRequest): Promise<string>;
}

export type PageObserver = (request: PageRequest, content: string) => Promise<void>;

export interface ScrapeStats {
  pagesFetched: number;
  records: number;
  stopReason: 'empty-page' | 'short-page' | 'page-limit';
}
