import type { LayoutDetection, PlaybackEntry } from '../types/index.js';
import { LayoutNotRecognizedError } from '../types/errors.js';
import { LayoutDetector } from './LayoutDetector.js';
import { RecordReconstructor } from './RecordReconstructor.js';
import { Tokenizer } from './Tokenizer.js';

export interface ParsedPage {
  tokens: string[];
  detection: LayoutDetection;
  entries: PlaybackEntry[];
}

export class PageParser {
  static parse(content: string, referenceDate: string): ParsedPage {
    const tokens = Tokenizer.tokenize(content);
    const detection = LayoutDetector.detect(tokens);
    if (!detection) {
      throw new LayoutNotRecognizedError(content, tokens, { referenceDate });
    }

    const reconstructor = RecordReconstructor.fromDetection(detection, referenceDate);
    return {
      tokens,
      detection,
      entries: reconstructor.reconstruct(tokens, detection.dataStart),
    };
  }
}
