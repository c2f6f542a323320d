import * as cheerio from 'cheerio';

/** Read-only view of a loaded page. Lookups return the first match only. */
export interface PageReader {
  text(selector: string): string | undefined;
  attribute(selector: string, name: string): string | undefined;
  documentTitle(): string;
}

const clean = (value: string | undefined): string | undefined => {
  const trimmed = value?.replace(/\s+/g, ' ').trim();
  return trimmed ? trimmed : undefined;
};

/** PageReader over an HTML snapshot of the live document. */
export class HtmlSnapshotReader implements PageReader {
  private readonly $: cheerio.CheerioAPI;
  private readonly title: string;

  constructor(html: string, documentTitle: string) {
    this.$ = cheerio.load(html);
    this.title = documentTitle;
  }

  text(selector: string): string | undefined {
    return clean(this.$(selector).first().text());
  }

  attribute(selector: string, name: string): string | undefined {
    return clean(this.$(selector).first().attr(name));
  }

  documentTitle(): string {
    return this.title || this.$('title').first().text().trim();
  }
}
