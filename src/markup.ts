import * as cheerio from 'cheerio';

export type ElementDescriptor = {
  tagName: string;
  attributes: Readonly<Record<string, string>>;
};

export interface MarkupDocument {
  elements(tagName: string): ElementDescriptor[];
}

export function parseMarkup(html: string): MarkupDocument {
  const $ = cheerio.load(html);
  return {
    elements(tagName: string): ElementDescriptor[] {
      const found: ElementDescriptor[] = [];
      $(tagName).each((_, el) => {
        found.push({ tagName: tagName.toLowerCase(), attributes: { ...($(el).attr() ?? {}) } });
      });
      return found;
    }
  };
}
