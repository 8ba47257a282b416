import { blake2b } from "@noble/hashes/blake2b";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { DIGEST_HASH_BYTES } from "../constants/digestConfig";
import { DigestSerializationError } from "../errors/chunker/ChunkerErrorTypes";
import { SectionDigest } from "../types/contentTypes";

// Fixed key order, rebuilt field by field so extra properties never leak in
export function canonicalizeSectionDigest(digest: SectionDigest): string {
  try {
    return JSON.stringify({
      title: digest.title,
      text: digest.text,
      subsections: digest.subsections.map((entry) => ({
        title: entry.title,
        text: entry.text,
      })),
    });
  } catch (error) {
    console.error("computeDigestHash: could not serialize section digest:", error);
    throw new DigestSerializationError(digest.title);
  }
}

export function computeDigestHash(digest: SectionDigest): string {
  const canonical = canonicalizeSectionDigest(digest);
  return bytesToHex(blake2b(utf8ToBytes(canonical), { dkLen: DIGEST_HASH_BYTES }));
}
