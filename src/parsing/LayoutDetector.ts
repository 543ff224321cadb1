import type { Layout, LayoutDetection } from '../types/index.js';
import { HEADER_LABELS, isDateShaped, isHeaderLabel, isTimeShaped } from './patterns.js';

type HeaderLayout = Exclude<Layout, 'headerless'>;

const HEADER_RUNS: ReadonlyArray<[HeaderLayout, ReadonlyArray<readonly string[]>]> = [
  ['with-date', [HEADER_LABELS.date, HEADER_LABELS.time, HEADER_LABELS.song, HEADER_LABELS.performer]],
  ['without-date', [HEADER_LABELS.time, HEADER_LABELS.song, HEADER_LABELS.performer]],
];

export const INFERENCE_WINDOW = 200;

export class LayoutDetector {
  /**
   * Header detection first: the earliest index where a known header run starts wins,
   * with the with-date run tried before the without-date run at each index.
   * Without a header the first date- or time-shaped token decides.
   */
  static detect(tokens: readonly string[], window = INFERENCE_WINDOW): LayoutDetection | null {
    return LayoutDetector.findHeader(tokens) ?? LayoutDetector.infer(tokens, window);
  }

  static findHeader(tokens: readonly string[]): LayoutDetection | null {
    for (let i = 0; i < tokens.length; i++) {
      for (const [layout, run] of HEADER_RUNS) {
        if (LayoutDetector.matchesRun(tokens, i, run)) {
          return {
            layout,
            dataStart: LayoutDetector.skipLabels(tokens, i + run.length),
            source: 'header',
          };
        }
      }
    }
    return null;
  }

  static infer(tokens: readonly string[], window = INFERENCE_WINDOW): LayoutDetection | null {
    const limit = Math.min(tokens.length, window);
    for (let i = 0; i < limit; i++) {
      if (isTimeShaped(tokens[i])) {
        return { layout: 'headerless', dataStart: i, source: 'inferred' };
      }
      if (isDateShaped(tokens[i])) {
        return { layout: 'with-date', dataStart: i, source: 'inferred' };
      }
    }
    return null;
  }

  private static matchesRun(
    tokens: readonly string[],
    start: number,
    run: ReadonlyArray<readonly string[]>
  ): boolean {
    if (start + run.length > tokens.length) return false;
    return run.every((labels, offset) => labels.includes(tokens[start + offset]));
  }

  // optional trailing columns and repeated labels still belong to the header
  private static skipLabels(tokens: readonly string[], index: number): number {
    let cursor = index;
    while (cursor < tokens.length && isHeaderLabel(tokens[cursor])) cursor++;
    return cursor;
  }
}
