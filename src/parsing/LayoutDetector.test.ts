import { describe, expect, it } from 'vitest';
import { LayoutDetector } from './LayoutDetector.js';

describe('LayoutDetector', () => {
  describe('detect', () => {
    it('should find the with-date header and start right after it', () => {
      const tokens = ['日期', '播出時間', '歌曲名稱', '演唱(奏)者', '01/05', '16:27', 'Song A', 'Artist A'];

      expect(LayoutDetector.detect(tokens)).toEqual({
        layout: 'with-date',
        dataStart: 4,
        source: 'header',
      });
    });

    it('should skip trailing column labels after the without-date header', () => {
      const tokens = ['曲目查詢', '播出時間', '歌曲名稱', '演唱(奏)者', '專輯', '出版者', 'CD編號', '16:27', 'S', 'A'];

      expect(LayoutDetector.detect(tokens)).toEqual({
        layout: 'without-date',
        dataStart: 7,
        source: 'header',
      });
    });

    it('should let the earliest header run win', () => {
      const tokens = [
        'x',
        '播出時間',
        '歌曲名稱',
        '演唱(奏)者',
        '16:27',
        'S',
        'A',
        '日期',
        '播出時間',
        '歌曲名稱',
        '演唱(奏)者',
      ];

      expect(LayoutDetector.detect(tokens)).toEqual({
        layout: 'without-date',
        dataStart: 4,
        source: 'header',
      });
    });

    it('should skip a repeated label right after the header', () => {
      const tokens = ['日期', '播出時間', '歌曲名稱', '演唱(奏)者', '專輯', '日期', '01/05'];

      expect(LayoutDetector.detect(tokens)?.dataStart).toBe(6);
    });

    it('should accept the full-width performer label', () => {
      const tokens = ['播出時間', '歌曲名稱', '演唱（奏）者', '16:27'];

      expect(LayoutDetector.detect(tokens)?.layout).toBe('without-date');
    });

    it('should infer the headerless layout from a leading time token', () => {
      expect(LayoutDetector.detect(['曲目查詢', '16:27', 'S', 'A'])).toEqual({
        layout: 'headerless',
        dataStart: 1,
        source: 'inferred',
      });
    });

    it('should infer the with-date layout from a leading date token', () => {
      expect(LayoutDetector.detect(['首頁', '01/05', '16:27', 'S', 'A'])).toEqual({
        layout: 'with-date',
        dataStart: 1,
        source: 'inferred',
      });
    });

    it('should return null when nothing looks like a playback log', () => {
      expect(LayoutDetector.detect(['首頁', '曲目查詢', '關於我們'])).toBeNull();
    });

    it('should only look at the first window of tokens when inferring', () => {
      const tokens = ['a', 'b', 'c', 'd', '16:27', 'S', 'A'];

      expect(LayoutDetector.detect(tokens, 3)).toBeNull();
      expect(LayoutDetector.detect(tokens, 5)?.dataStart).toBe(4);
    });
  });
});
