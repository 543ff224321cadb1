import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { PlaybackRecord } from '../types/index.js';
import { ArchiveService, mergeRows, toRow } from './ArchiveService.js';

const record = (overrides: Partial<PlaybackRecord> = {}): PlaybackRecord => ({
  date: '2024-01-05',
  sourceDate: '01/05',
  time: '16:27',
  song: 'Song A',
  performer: 'Artist A',
  album: 'Album A',
  publisher: '',
  catalogNumber: '',
  pageNumber: 1,
  daysAgo: 0,
  retrievedAt: '2024-01-05T18:00:00',
  ...overrides,
});

describe('mergeRows', () => {
  it('should keep the later row when date, time, song and performer match', () => {
    const existing = [toRow(record({ album: 'Old' }))];
    const incoming = [toRow(record({ album: 'New' })), toRow(record({ time: '16:30', song: 'Song B' }))];

    const merged = mergeRows(existing, incoming);

    expect(merged).toHaveLength(2);
    expect(merged[0]['專輯']).toBe('New');
    expect(merged[1]['歌曲名稱']).toBe('Song B');
  });

  it('should keep rows that differ in a key column', () => {
    const merged = mergeRows([toRow(record())], [toRow(record({ performer: 'Artist B' }))]);

    expect(merged).toHaveLength(2);
  });

  it('should compare whole rows when the key columns are missing', () => {
    const merged = mergeRows([{ a: '1', b: '2' }], [{ a: '1', b: '2' }, { a: '1', b: '3' }]);

    expect(merged).toEqual([
      { a: '1', b: '2' },
      { a: '1', b: '3' },
    ]);
  });
});

describe('ArchiveService', () => {
  let dir: string;
  const service = new ArchiveService();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'playlog-archive-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write a CSV with a byte order mark and the column labels', async () => {
    const path = join(dir, 'nested', 'out.csv');

    await expect(service.save(path, [record()])).resolves.toBe(1);

    const content = await readFile(path, 'utf8');
    expect(content.charCodeAt(0)).toBe(0xfeff);
    expect(content.slice(1).split('\n').slice(0, 2)).toEqual([
      '日期,日期_mmdd,播出時間,歌曲名稱,演唱(奏)者,專輯,出版者,CD編號,dt_days_ago,page,scraped_at',
      '2024-01-05,01/05,16:27,Song A,Artist A,Album A,,,0,1,2024-01-05T18:00:00',
    ]);
  });

  it('should read back what it wrote', async () => {
    const path = join(dir, 'out.csv');
    await service.save(path, [record(), record({ time: '16:30', song: 'Song, "B"' })]);

    await expect(service.readRows(path)).resolves.toEqual([
      toRow(record()),
      toRow(record({ time: '16:30', song: 'Song, "B"' })),
    ]);
  });

  it('should merge into an existing file when asked to', async () => {
    const path = join(dir, 'out.csv');
    await service.save(path, [record({ album: 'Old' }), record({ time: '09:00' })]);

    const written = await service.save(path, [record({ album: 'New' })], true);

    expect(written).toBe(2);
    const rows = await service.readRows(path);
    expect(rows.map((row) => [row['播出時間'], row['專輯']])).toEqual([
      ['09:00', 'Album A'],
      ['16:27', 'New'],
    ]);
  });

  it('should replace the file when not merging', async () => {
    const path = join(dir, 'out.csv');
    await service.save(path, [record(), record({ time: '09:00' })]);
    await service.save(path, [record({ time: '10:00' })]);

    const rows = await service.readRows(path);
    expect(rows.map((row) => row['播出時間'])).toEqual(['10:00']);
  });

  it('should read a missing file as empty', async () => {
    await expect(service.readRows(join(dir, 'missing.csv'))).resolves.toEqual([]);
  });
});
