import { load, type CheerioAPI } from 'cheerio';
import type { JsonValue } from '../types';
import { tryParseJson } from '../utils/json-tree';

const NON_VISIBLE = 'script, style, noscript, template';

/**
 * PageDocument
 * One parsed detail page shared by every extraction strategy.
 * Parsing happens once; visible text is derived lazily on a separate tree
 * so that script blocks stay readable.
 */
export class PageDocument {
  readonly url: string;
  private readonly $: CheerioAPI;
  private readonly html: string;
  private cachedText: string | null = null;

  constructor(html: string, url: string) {
    this.html = html;
    this.url = url;
    this.$ = load(html);
  }

  /**
   * Raw contents of every script matching the selector, in document order.
   */
  scriptBlocks(selector: string): string[] {
    const blocks: string[] = [];
    this.$(selector).each((_, element) => {
      const content = this.$(element).html();
      if (content && content.trim()) {
        blocks.push(content);
      }
    });
    return blocks;
  }

  /**
   * Parsed JSON payloads of the matching scripts. Blocks that fail to parse are skipped.
   */
  jsonBlocks(selector: string, prepare: (raw: string) => string = (raw) => raw): JsonValue[] {
    const payloads: JsonValue[] = [];
    for (const block of this.scriptBlocks(selector)) {
      const parsed = tryParseJson(prepare(block));
      if (parsed === null) {
        console.log(`[DEBUG] Skipping malformed JSON block in ${selector} (length: ${block.length})`);
        continue;
      }
      payloads.push(parsed);
    }
    return payloads;
  }

  /**
   * Human-visible text of the page: scripts and styles removed, element
   * boundaries separated by a space, whitespace collapsed.
   */
  get visibleText(): string {
    if (this.cachedText === null) {
      const $ = load(this.html);
      $(NON_VISIBLE).remove();
      $('body *').each((_, element) => {
        $(element).append(' ');
      });
      this.cachedText = $('body').text().replace(/\s+/g, ' ').trim();
    }
    return this.cachedText;
  }
}
