import he from 'he';

const CJK_RE = /[\u4e00-\u9fff]/;
const MOJIBAKE_HINT_RE = /[ÃÂæåäèéçð]/;
const NBSP_BYTE = 0xa0;

type DecodeResult = { ok: true; text: string } | { ok: false; reason: string };

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(bytes: Uint8Array): DecodeResult {
  try {
    return { ok: true, text: strictUtf8.decode(bytes) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/** Code units as Latin-1 bytes, or null when a code point does not fit in one byte. */
function latin1Bytes(text: string): Uint8Array | null {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) return null;
    bytes[i] = code;
  }
  return bytes;
}

function stripTrailingNbsp(bytes: Uint8Array): Uint8Array {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === NBSP_BYTE) end--;
  return bytes.subarray(0, end);
}

export class TextRepair {
  /**
   * UTF-8 text that went through a Latin-1 decode shows up as e.g. `æ²ç®` instead of `曲目`.
   * Returns the recovered text, or the input when recovery does not yield CJK text.
   */
  static recoverMojibake(text: string): string {
    if (CJK_RE.test(text) || !MOJIBAKE_HINT_RE.test(text)) {
      return text;
    }

    const bytes = latin1Bytes(text);
    if (!bytes) return text;

    let decoded = decodeUtf8(bytes);
    if (!decoded.ok) {
      // a trailing &nbsp; byte breaks an otherwise valid sequence
      decoded = decodeUtf8(stripTrailingNbsp(bytes));
    }

    return decoded.ok && CJK_RE.test(decoded.text) ? decoded.text : text;
  }

  static normalizeWhitespace(text: string): string {
    return text.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
  }

  static fixText(fragment: string | null | undefined): string {
    if (!fragment) return '';

    const decoded = he.decode(fragment).replace(/[\r\n]/g, ' ');
    return TextRepair.normalizeWhitespace(TextRepair.recoverMojibake(decoded));
  }
}
