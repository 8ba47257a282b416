export const NO_LIMIT = -1;

export const ELLIPSIS = "...";

export const COVERED_TOPICS_CAPTION = "Covered topics in this subsection:";

// BLAKE2b output size in bytes (128-bit identifiers)
export const DIGEST_HASH_BYTES = 16;
