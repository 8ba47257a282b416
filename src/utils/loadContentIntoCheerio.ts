import * as cheerio from "cheerio";
import { EmptyDocumentError, MarkupParseError } from "../errors/chunker/ChunkerErrorTypes";
import { ChunkDebugInfo } from "../types/chunkTypes";

export function loadContentIntoCheerio(
  html: string,
  debugInfo: ChunkDebugInfo,
  source: string = "document"
): cheerio.CheerioAPI {
  if (!html.trim()) {
    debugInfo.cheerioLoadSuccess = false;
    debugInfo.error = "No markup provided";
    throw new EmptyDocumentError(source);
  }

  try {
    const $ = cheerio.load(html);
    debugInfo.cheerioLoadSuccess = true;
    return $;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    debugInfo.cheerioLoadSuccess = false;
    debugInfo.error = `Cheerio load failed: ${reason}`;
    console.error(`loadContentIntoCheerio: failed to parse ${source}:`, reason);
    throw new MarkupParseError(reason);
  }
}
