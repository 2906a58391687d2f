import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';

/**
 * The slice of a parsed document the listing extractor is allowed to see.
 */
export interface MarkupNode {
  find(selector: string): MarkupNode | null;
  findAll(selector: string): MarkupNode[];
  text(): string;
  attr(name: string): string | null;
}

export interface MarkupTree {
  findAll(selector: string): MarkupNode[];
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

class CheerioNode implements MarkupNode {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly element: Element,
  ) {}

  find(selector: string): MarkupNode | null {
    const match = this.$(this.element).find(selector).get(0);
    return match ? new CheerioNode(this.$, match) : null;
  }

  findAll(selector: string): MarkupNode[] {
    return this.$(this.element)
      .find(selector)
      .toArray()
      .map((element) => new CheerioNode(this.$, element));
  }

  text(): string {
    return normalizeWhitespace(this.$(this.element).text());
  }

  attr(name: string): string | null {
    return this.$(this.element).attr(name) ?? null;
  }
}

export function loadMarkup(html: string): MarkupTree {
  const $ = cheerio.load(html);
  return {
    findAll: (selector) =>
      $.root()
        .find(selector)
        .toArray()
        .map((element) => new CheerioNode($, element)),
  };
}
