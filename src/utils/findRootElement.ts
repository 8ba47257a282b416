import { CheerioAPI } from "cheerio";
import { isTag } from "domhandler";
import {
  DEFAULT_MIN_ROOT_TEXT_LENGTH,
  FALLBACK_SKIPPED_SELECTOR,
  ROOT_SELECTORS,
} from "../constants/chunkerConfig";
import { SectionContainer } from "../types/contentTypes";

export function findRootElement(
  $: CheerioAPI,
  minTextLength: number = DEFAULT_MIN_ROOT_TEXT_LENGTH
): SectionContainer {
  for (const selector of ROOT_SELECTORS) {
    const $candidate = $(selector).first();
    const candidate = $candidate.get(0);

    if (candidate && $candidate.text().trim()) {
      return candidate;
    }
  }

  const substantial = $("*")
    .not(FALLBACK_SKIPPED_SELECTOR)
    .toArray()
    .filter(isTag)
    .find((element) => $(element).text().trim().length > minTextLength);

  return substantial ?? $.root()[0];
}
