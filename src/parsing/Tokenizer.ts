import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import { TextRepair } from '../utils/textRepair.js';
import { NAV_PUNCTUATION_RE } from './patterns.js';

const HIDDEN_SELECTOR = 'head, script, style, noscript, template';
const LINE_BREAK_RE = /\r\n|\r|\n/;

export class Tokenizer {
  /**
   * Visible text of the page in document order: every text node, split on line breaks,
   * repaired and stripped of empty and navigation-only fragments.
   */
  static tokenize(content: string): string[] {
    return Tokenizer.fragments(content)
      .map((fragment) => TextRepair.fixText(fragment))
      .filter((token) => token.length > 0 && !NAV_PUNCTUATION_RE.test(token));
  }

  static fragments(content: string): string[] {
    const $ = cheerio.load(content);
    $(HIDDEN_SELECTOR).remove();

    const fragments: string[] = [];
    const visit = (node: AnyNode): void => {
      if (isText(node)) {
        fragments.push(...node.data.split(LINE_BREAK_RE));
        return;
      }
      if (hasChildren(node)) {
        node.children.forEach(visit);
      }
    };

    $.root().contents().toArray().forEach(visit);
    return fragments;
  }
}
