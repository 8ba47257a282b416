import { load } from "cheerio";
import { COVERED_TOPICS_CAPTION, ELLIPSIS, NO_LIMIT } from "../constants/digestConfig";
import { ContentNode } from "../types/contentTypes";

function coveredTopicsMarkup(subsections: ReadonlyArray<Pick<ContentNode, "title">>): string {
  const $ = load(`<p>${COVERED_TOPICS_CAPTION}</p><ul></ul>`, null, false);
  const $list = $("ul");

  for (const subsection of subsections) {
    $list.append($("<li></li>").text(subsection.title));
  }

  return $.html();
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Cuts a child's text down to `maxLines` lines for its parent's digest.
 *
 * An empty text over deeper structure becomes a list of the deeper titles,
 * and an ellipsis marks text that was cut or that has subsections below it.
 */
export function shortenText(
  text: string,
  maxLines: number,
  subsections: ReadonlyArray<Pick<ContentNode, "title">> = []
): string {
  if (maxLines === NO_LIMIT) {
    return text;
  }

  if (!text && subsections.length > 0) {
    return coveredTopicsMarkup(subsections);
  }

  const lines = splitLines(text);

  if (lines.length <= maxLines) {
    if (subsections.length > 0) {
      lines.push(ELLIPSIS);
    }
    return lines.join("\n");
  }

  return [...lines.slice(0, maxLines), ELLIPSIS].join("\n");
}
