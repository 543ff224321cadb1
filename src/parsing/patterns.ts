export const DATE_MMDD_RE = /^(\d{2})\/(\d{2})$/; // e.g. 01/05
export const TIME_SHAPE_RE = /^\d{2}:\d{2}$/;
export const TIME_RE = /^(?:[01]\d|2[0-3]):[0-5]\d$/; // e.g. 16:27

export const NAV_PUNCTUATION_RE = /^[<>;]+$/;

export const STOP_WORDS: ReadonlySet<string> = new Set([
  '下一頁',
  '上一頁',
  '第一頁',
  '最末頁',
  '回首頁',
  '版權所有',
]);

const FOOTER_RE = /^(?:copyright\b|©)/i;

export const HEADER_LABELS = {
  date: ['日期', '播出日期'],
  time: ['播出時間', '時間'],
  song: ['歌曲名稱', '曲名'],
  performer: ['演唱(奏)者', '演唱（奏）者', '演唱者', '演奏者'],
  trailing: ['專輯', '出版者', 'CD編號', 'CD 編號'],
} as const;

const ALL_LABELS: ReadonlySet<string> = new Set(Object.values(HEADER_LABELS).flat());

export function isDateShaped(token: string): boolean {
  return DATE_MMDD_RE.test(token);
}

export function isTimeShaped(token: string): boolean {
  return TIME_SHAPE_RE.test(token);
}

export function isTime(token: string): boolean {
  return TIME_RE.test(token);
}

export function isStopWord(token: string): boolean {
  return STOP_WORDS.has(token) || FOOTER_RE.test(token);
}

export function isHeaderLabel(token: string): boolean {
  return ALL_LABELS.has(token);
}
