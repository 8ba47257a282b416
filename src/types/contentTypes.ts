// types/contentTypes.ts
import { Document, Element } from "domhandler";

export interface ContentNode {
  title: string;
  text: string;
  level: number | null;
  subsections: ContentNode[];
}

export interface SectionDigestEntry {
  title: string;
  text: string;
}

export interface SectionDigest {
  title: string;
  text: string;
  subsections: SectionDigestEntry[];
}

export interface DigestNode {
  digest_hash: string;
  parent_digest_hash: string | null;
  title: string;
  text: string;
  level: number | null;
  section_digest: SectionDigest;
}

// Anything the chunker can be pointed at: a parsed document, a fragment or one element
export type SectionContainer = Element | Document;
