import type { Layout, LayoutDetection, PlaybackEntry, ScanState, ScanStep } from '../types/index.js';
import { resolveDate } from '../utils/dates.js';
import { isDateShaped, isStopWord, isTime, isTimeShaped } from './patterns.js';

interface LayoutPolicy {
  /** Each record opens with its own `MM/DD` token followed by a time token. */
  datedRows: boolean;
  /** Standalone date tokens move the current date forward for the rows after them. */
  rollingDate: boolean;
  /** Ends the optional trailing columns of the record before it. */
  isBoundary: (token: string) => boolean;
}

const POLICIES: Record<Layout, LayoutPolicy> = {
  'with-date': {
    datedRows: true,
    rollingDate: false,
    isBoundary: isDateShaped,
  },
  'without-date': {
    datedRows: false,
    rollingDate: false,
    isBoundary: isTimeShaped,
  },
  headerless: {
    datedRows: false,
    rollingDate: true,
    isBoundary: (token) => isTimeShaped(token) || isDateShaped(token),
  },
};

const MAX_EXTRAS = 3;

// a date or time sitting where the song or performer should be means the row is misaligned
function isMisplaced(token: string): boolean {
  return isDateShaped(token) || isTimeShaped(token);
}

export function isCompleteEntry(entry: PlaybackEntry): boolean {
  return (
    entry.date.length > 0 &&
    isTime(entry.time) &&
    entry.song.length > 0 &&
    entry.performer.length > 0
  );
}

export class RecordReconstructor {
  private readonly policy: LayoutPolicy;

  constructor(
    readonly layout: Layout,
    readonly referenceDate: string
  ) {
    this.policy = POLICIES[layout];
  }

  static fromDetection(detection: LayoutDetection, referenceDate: string): RecordReconstructor {
    return new RecordReconstructor(detection.layout, referenceDate);
  }

  /** Index of the first stop-word at or after `start`, or the token count. */
  static scanLimit(tokens: readonly string[], start: number): number {
    for (let i = start; i < tokens.length; i++) {
      if (isStopWord(tokens[i])) return i;
    }
    return tokens.length;
  }

  initialState(dataStart: number): ScanState {
    return { cursor: dataStart, currentDate: this.referenceDate };
  }

  reconstruct(tokens: readonly string[], dataStart: number): PlaybackEntry[] {
    const visible = tokens.slice(0, RecordReconstructor.scanLimit(tokens, dataStart));
    const entries: PlaybackEntry[] = [];

    let state = this.initialState(dataStart);
    for (;;) {
      const step = this.step(visible, state);
      if (step.kind === 'end') break;
      if (step.kind === 'record' && isCompleteEntry(step.entry)) {
        entries.push(step.entry);
      }
      state = step.state;
    }

    return entries;
  }

  /**
   * Advances the scan by one record attempt or one skipped token.
   * `tokens` must already be cut at the first stop-word.
   */
  step(tokens: readonly string[], state: ScanState): ScanStep {
    const { cursor } = state;
    if (cursor >= tokens.length) return { kind: 'end' };

    const token = tokens[cursor];
    const skip: ScanStep = { kind: 'skip', state: { ...state, cursor: cursor + 1 } };

    if (this.policy.datedRows) {
      if (!isDateShaped(token)) return skip;

      const date = resolveDate(token, this.referenceDate);
      const time = tokens[cursor + 1];
      if (!date || time === undefined || !isTime(time)) return skip;

      return this.readFields(tokens, state, cursor + 2, { date, sourceDate: token }, time);
    }

    if (this.policy.rollingDate && isDateShaped(token)) {
      const date = resolveDate(token, this.referenceDate);
      return date ? { kind: 'skip', state: { cursor: cursor + 1, currentDate: date } } : skip;
    }

    if (!isTime(token)) return skip;
    return this.readFields(tokens, state, cursor + 1, { date: state.currentDate, sourceDate: '' }, token);
  }

  private readFields(
    tokens: readonly string[],
    state: ScanState,
    fieldStart: number,
    { date, sourceDate }: Pick<PlaybackEntry, 'date' | 'sourceDate'>,
    time: string
  ): ScanStep {
    const song = tokens[fieldStart];
    const performer = tokens[fieldStart + 1];
    if (song === undefined || performer === undefined) return { kind: 'end' };

    if (isMisplaced(song) || isMisplaced(performer)) {
      return { kind: 'skip', state: { ...state, cursor: state.cursor + 1 } };
    }

    const extras: string[] = [];
    let cursor = fieldStart + 2;
    while (cursor < tokens.length && !this.policy.isBoundary(tokens[cursor])) {
      extras.push(tokens[cursor]);
      cursor++;
    }

    const [album = '', publisher = '', catalogNumber = ''] = extras.slice(0, MAX_EXTRAS);
    return {
      kind: 'record',
      state: { cursor, currentDate: date },
      entry: { date, sourceDate, time, song, performer, album, publisher, catalogNumber },
    };
  }
}
