import { NO_LIMIT } from "../constants/digestConfig";
import { ContentNode, SectionDigest } from "../types/contentTypes";
import { shortenText } from "./shortenText";

export function generateSectionDigest(node: ContentNode): SectionDigest {
  // Children get a single line when the parent has text of its own to show
  const childLineLimit = node.text ? 1 : NO_LIMIT;

  return {
    title: node.title,
    text: node.text,
    subsections: node.subsections.map((child) => ({
      title: child.title,
      text: shortenText(child.text, childLineLimit, child.subsections),
    })),
  };
}
