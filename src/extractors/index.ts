import { CheerioAPI } from "cheerio";

// extractors/BaseExtractor.ts
export abstract class BaseExtractor<T> {
  protected $: CheerioAPI;

  constructor(cheerioInstance: CheerioAPI) {
    this.$ = cheerioInstance;
  }

  abstract extract(): T;

  protected sanitizeText(text: string): string {
    return text
      .replace(/\s+/g, " ")
      .replace(/[\n\r\t]/g, " ")
      .trim();
  }
}
