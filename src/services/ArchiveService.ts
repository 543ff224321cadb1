import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { PlaybackRecord } from '../types/index.js';

export type CsvRow = Record<string, string>;

export const COLUMNS = {
  date: '日期',
  sourceDate: '日期_mmdd',
  time: '播出時間',
  song: '歌曲名稱',
  performer: '演唱(奏)者',
  album: '專輯',
  publisher: '出版者',
  catalogNumber: 'CD編號',
  daysAgo: 'dt_days_ago',
  pageNumber: 'page',
  retrievedAt: 'scraped_at',
} as const;

export const KEY_COLUMNS: readonly string[] = [
  COLUMNS.date,
  COLUMNS.time,
  COLUMNS.song,
  COLUMNS.performer,
];

const RECORD_COLUMNS: readonly string[] = Object.values(COLUMNS);

const CsvRowsSchema = z.array(z.record(z.string()));

const BOM = '\ufeff';

export function toRow(record: PlaybackRecord): CsvRow {
  return {
    [COLUMNS.date]: record.date,
    [COLUMNS.sourceDate]: record.sourceDate,
    [COLUMNS.time]: record.time,
    [COLUMNS.song]: record.song,
    [COLUMNS.performer]: record.performer,
    [COLUMNS.album]: record.album,
    [COLUMNS.publisher]: record.publisher,
    [COLUMNS.catalogNumber]: record.catalogNumber,
    [COLUMNS.daysAgo]: String(record.daysAgo),
    [COLUMNS.pageNumber]: String(record.pageNumber),
    [COLUMNS.retrievedAt]: record.retrievedAt,
  };
}

function columnsOf(rows: readonly CsvRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    Object.keys(row).forEach((column) => seen.add(column));
  }
  return [...seen];
}

/**
 * Union of both row sets with duplicates removed, keeping the later row.
 * Rows are keyed on the date/time/song/performer columns that both sides have;
 * when they share none of them the whole row is the key.
 */
export function mergeRows(existing: readonly CsvRow[], incoming: readonly CsvRow[]): CsvRow[] {
  const combined = [...existing, ...incoming];
  const columns = columnsOf(combined);
  const sides = [existing, incoming].filter((rows) => rows.length > 0).map(columnsOf);
  const keyColumns = KEY_COLUMNS.filter((column) => sides.every((side) => side.includes(column)));
  const keyOf = (row: CsvRow): string =>
    JSON.stringify((keyColumns.length ? keyColumns : columns).map((column) => row[column] ?? ''));

  const lastIndex = new Map<string, number>();
  combined.forEach((row, index) => lastIndex.set(keyOf(row), index));

  return combined.filter((row, index) => lastIndex.get(keyOf(row)) === index);
}

export class ArchiveService {
  async readRows(filePath: string): Promise<CsvRow[]> {
    if (!existsSync(filePath)) {
      return [];
    }

    const content = await readFile(filePath, 'utf8');
    const parsed: unknown = parse(content, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });

    const result = CsvRowsSchema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError(`Unreadable CSV archive: ${filePath}`, {
        issues: result.error.issues.slice(0, 5),
      });
    }
    return result.data;
  }

  async writeRows(filePath: string, rows: readonly CsvRow[]): Promise<void> {
    const known = columnsOf(rows);
    const columns = [
      ...RECORD_COLUMNS.filter((column) => known.includes(column)),
      ...known.filter((column) => !RECORD_COLUMNS.includes(column)),
    ];

    await mkdir(dirname(filePath), { recursive: true });
    const body = stringify(
      rows.map((row) => columns.map((column) => row[column] ?? '')),
      { header: true, columns: columns.length ? columns : [...RECORD_COLUMNS] }
    );
    // UTF-8 with BOM
    await writeFile(filePath, BOM + body, 'utf8');
  }

  /**
   * Writes the records to `filePath`, replacing it, or merging into it when `appendDedupe` is set.
   * Returns the number of rows in the written file.
   */
  async save(
    filePath: string,
    records: readonly PlaybackRecord[],
    appendDedupe = false
  ): Promise<number> {
    const incoming = records.map(toRow);
    let rows = incoming;

    if (appendDedupe) {
      const existing = await this.readRows(filePath);
      rows = mergeRows(existing, incoming);
      Logger.debug('Merged with existing archive', {
        existing: existing.length,
        incoming: incoming.length,
        merged: rows.length,
      });
    }

    await this.writeRows(filePath, rows);
    return rows.length;
  }
}
