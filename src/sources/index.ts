import { z } from "zod";
import type { RawPosting } from "../types";

export interface SearchRequest {
  query: string;
  location: string;
  country: string;
  maxCount: number;
}

/** Produces raw, untrusted records; the pipeline validates each one. */
export interface ScraperSource {
  readonly name: string;
  search(request: SearchRequest, signal?: AbortSignal): Promise<unknown[]>;
}

// Scrapers emit null for missing fields as often as they omit them
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const RawPostingSchema: z.ZodType<RawPosting, z.ZodTypeDef, unknown> =
  z.object({
    title: optionalString,
    company: optionalString,
    location: optionalString,
    description: optionalString,
    sourceURL: optionalString,
    sourcePlatform: optionalString,
    postedDate: optionalString,
    salaryText: optionalString,
    remote: z
      .union([z.boolean(), z.string()])
      .nullish()
      .transform((value) => value ?? undefined),
    externalId: optionalString,
  });

export type ParsedPosting = RawPosting;

export type ParseResult =
  | { ok: true; posting: ParsedPosting }
  | { ok: false; errors: string[] };

export function parseRawPosting(raw: unknown): ParseResult {
  const result = RawPostingSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, posting: result.data };
  }
  return {
    ok: false,
    errors: result.error.issues.map(
      (issue) => `${issue.path.join(".") || "record"}: ${issue.message}`,
    ),
  };
}
