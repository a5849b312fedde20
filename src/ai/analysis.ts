import { z } from "zod";

const text = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? "");

export const analyzedFieldSchema = z
  .object({
    name: text(),
    type: text().transform((value) => value || "text"),
    required: z.boolean().nullish().transform((value) => value ?? false),
    validation: text(),
  })
  .passthrough();

export const analyzedFormSchema = z
  .object({
    id: text(),
    action: text(),
    method: text().transform((value) => (value || "GET").toUpperCase()),
    fields: z.array(analyzedFieldSchema).default([]),
  })
  .passthrough();

export const analyzedButtonSchema = z
  .object({
    id: text(),
    text: text(),
    action: text(),
  })
  .passthrough();

export const analyzedLinkSchema = z
  .object({
    href: text(),
    text: text(),
  })
  .passthrough();

export const navigationItemSchema = z
  .object({
    menu_item: text(),
    url: text(),
  })
  .passthrough();

export const structuredAnalysisSchema = z
  .object({
    forms: z.array(analyzedFormSchema).default([]),
    buttons: z.array(analyzedButtonSchema).default([]),
    links: z.array(analyzedLinkSchema).default([]),
    navigation: z.array(navigationItemSchema).default([]),
  })
  .passthrough();

export type AnalyzedField = z.infer<typeof analyzedFieldSchema>;
export type AnalyzedForm = z.infer<typeof analyzedFormSchema>;
export type AnalyzedButton = z.infer<typeof analyzedButtonSchema>;
export type AnalyzedLink = z.infer<typeof analyzedLinkSchema>;
export type NavigationItem = z.infer<typeof navigationItemSchema>;
export type StructuredAnalysis = z.infer<typeof structuredAnalysisSchema>;

/** What the model sent back, before normalisation. */
export type AnalysisOutcome =
  | { kind: "structured"; analysis: StructuredAnalysis }
  | { kind: "raw"; text: string };

/**
 * The single shape downstream stages consume. A raw response keeps the
 * model's text under `rawResponse` with every structural list empty.
 */
export type HtmlAnalysis = StructuredAnalysis & {
  source: AnalysisOutcome["kind"];
  rawResponse?: string;
};

/**
 * Pull a JSON document out of a model response, tolerating a fenced
 * ```json block around it.
 */
export function extractJson(content: string): string {
  const trimmed = content.trim();
  const fenced = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  return fenced ? fenced[1].trim() : trimmed;
}

export function classifyAnalysis(content: string): AnalysisOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(content));
  } catch {
    return { kind: "raw", text: content };
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { kind: "raw", text: content };
  }

  const result = structuredAnalysisSchema.safeParse(parsed);
  return result.success
    ? { kind: "structured", analysis: result.data }
    : { kind: "raw", text: content };
}

export function emptyAnalysis(rawResponse: string): HtmlAnalysis {
  return {
    source: "raw",
    rawResponse,
    forms: [],
    buttons: [],
    links: [],
    navigation: [],
  };
}

export function normalizeAnalysis(content: string): HtmlAnalysis {
  const outcome = classifyAnalysis(content);
  switch (outcome.kind) {
    case "structured":
      return { ...outcome.analysis, source: "structured" };
    case "raw":
      return emptyAnalysis(outcome.text);
  }
}
