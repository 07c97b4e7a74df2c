import * as fs from "fs";
import * as YAML from "yaml";
import { z } from "zod";
import { FIELD_NAMES, SourceConfig } from "./types";
import { ConfigurationError } from "./core/errors";
import { cleanText, getErrorMessage } from "./core/utils";
import { validateSelector } from "./selector-engine";

const selectorSchema = z
  .string()
  .trim()
  .min(1, "Selector must not be empty")
  .superRefine((expression, ctx) => {
    const problem = validateSelector(expression);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Malformed selector ${problem}` });
    }
  });

const selectorListSchema = z.union([selectorSchema, z.array(selectorSchema).min(1)]);

/** Unknown field names fail here instead of being ignored mid-crawl */
const fieldSpecSchema = z.record(z.enum(FIELD_NAMES), selectorListSchema);

const httpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((url) => /^https?:\/\//i.test(url), "Start URL must use http or https");

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? undefined : cleanText(String(value))));

const sourceSchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1, "Source name must not be empty")
      .transform((name) => name.replace(/\s+/g, " ")),
    category: optionalText,
    region: optionalText,
    enabled: z.boolean().default(true),
    start_urls: z.array(httpUrlSchema).min(1, "At least one start URL is required"),
    listing: z
      .object({
        item_selector: selectorListSchema,
        fields: fieldSpecSchema,
        detail_link_selector: selectorSchema.optional(),
        follow_links_selector: selectorListSchema.optional(),
      })
      .strict(),
    detail: z.object({ fields: fieldSpecSchema }).strict().optional(),
    pagination: z.object({ next_page_selector: selectorListSchema }).strict().optional(),
    jsonld_fallback: z.boolean().default(true),
  })
  .strict();

const sourcesFileSchema = z
  .object({ sources: z.array(sourceSchema).default([]) })
  .superRefine(({ sources }, ctx) => {
    const seen = new Set<string>();
    sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", index, "name"],
          message: `Duplicate source name "${source.name}"`,
        });
      }
      seen.add(source.name);
    });
  });

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

/**
 * Parse and validate a YAML source list.
 * Every selector is compiled here, so a malformed one fails before any fetch.
 * @param text - YAML document with a top-level `sources` list
 * @param origin - Shown in error messages, usually the file path
 * @throws ConfigurationError on YAML syntax or schema problems
 */
export function parseSources(text: string, origin = "<inline>"): SourceConfig[] {
  let data: unknown;
  try {
    data = YAML.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${origin}`, [getErrorMessage(err)]);
  }

  const parsed = sourcesFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid source configuration in ${origin}`,
      parsed.error.issues.map(formatIssue)
    );
  }

  const sources: SourceConfig[] = parsed.data.sources;
  return deepFreeze(sources);
}

/**
 * Read and validate the source list from disk.
 * @throws ConfigurationError when the file is missing or invalid
 */
export function loadSources(filePath: string): SourceConfig[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${filePath}`, [
      getErrorMessage(err),
    ]);
  }
  return parseSources(text, filePath);
}
