import { z } from "zod";
import {
  InvalidContentNodeError,
  InvalidDigestStreamError,
} from "../errors/chunker/ChunkerErrorTypes";
import { ContentNode, DigestNode } from "../types/contentTypes";

export const ContentNodeSchema: z.ZodType<ContentNode> = z.lazy(() =>
  z.object({
    title: z.string(),
    text: z.string(),
    level: z.number().int().nullable(),
    subsections: z.array(ContentNodeSchema),
  })
);

const SectionDigestSchema = z.object({
  title: z.string(),
  text: z.string(),
  subsections: z.array(z.object({ title: z.string(), text: z.string() })),
});

export const DigestNodeSchema = z.object({
  digest_hash: z.string().regex(/^[0-9a-f]{32}$/),
  parent_digest_hash: z.string().regex(/^[0-9a-f]{32}$/).nullable(),
  title: z.string(),
  text: z.string(),
  level: z.number().int().nullable().default(null),
  section_digest: SectionDigestSchema,
});

export const BatchRequestSchema = z.object({
  documents: z
    .array(
      z.object({
        id: z.string().min(1),
        html: z.string(),
      })
    )
    .min(1),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function validateContentNode(input: unknown): ContentNode {
  const result = ContentNodeSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidContentNodeError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Parses JSON Lines text into digest nodes. Blank lines are skipped; line
 * numbers in errors count every line of the input.
 */
export function parseDigestLines(input: string): DigestNode[] {
  const nodes: DigestNode[] = [];

  input.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new InvalidDigestStreamError(`line ${index + 1} is not valid JSON`);
    }

    const result = DigestNodeSchema.safeParse(parsed);
    if (!result.success) {
      throw new InvalidDigestStreamError(`line ${index + 1}: ${describeIssues(result.error)}`);
    }
    nodes.push(result.data);
  });

  return nodes;
}
