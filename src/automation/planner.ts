import { PAGE_LOAD_BUDGET_SECONDS } from "../bdd/generator.js";
import type { BDDFeature, BDDScenario } from "../bdd/types.js";
import type { FormField, ScrapeResult } from "../scraper/types.js";
import { slugify } from "../utils/paths.js";
import type { PlannedTest, TestAction } from "./types.js";

const SAMPLE_VALUES: Record<string, string> = {
  email: "test@example.com",
  password: "TestPassword123!",
  tel: "5551234567",
  number: "42",
  url: "https://example.com",
};
const DEFAULT_SAMPLE_VALUE = "Test value";

const UNFILLABLE_TYPES = new Set([
  "submit",
  "button",
  "reset",
  "hidden",
  "image",
  "checkbox",
  "radio",
  "file",
]);

const QUOTED = /"([^"]+)"/;
const CLICK_STEP = /\b(click|clicks|press|presses|tap|taps|button|link)\b|tıkla/i;
const LINK_STEP = /\blink\b|bağlantı/i;
const SUBMIT_STEP = /\bsubmit\b|gönder/i;
const EMPTY_STEP = /\b(empty|blank)\b|boş/i;
const FILL_STEP = /\b(fill|fills|enter|enters|type|types)\b|doldur/i;
const SKIP_TAGS = new Set(["@skip", "@manual"]);

export const SUBMIT_SELECTOR = 'form [type="submit"], form button:not([type])';

export function sampleValue(type: string): string {
  return SAMPLE_VALUES[type.toLowerCase()] ?? DEFAULT_SAMPLE_VALUE;
}

function attributeSelector(attribute: string, value: string): string {
  return `[${attribute}="${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"]`;
}

export function fieldSelector(field: Pick<FormField, "id" | "name">): string {
  return field.id ? attributeSelector("id", field.id) : attributeSelector("name", field.name);
}

function fillableFields(scrape: ScrapeResult): FormField[] {
  const form = scrape.forms[0];
  if (!form) return [];
  return form.fields.filter(
    (field) =>
      field.tag !== "select" &&
      !UNFILLABLE_TYPES.has(field.type.toLowerCase()) &&
      (field.id !== "" || field.name !== "")
  );
}

function blankFieldSelector(label: string, fields: FormField[]): string {
  const match = fields.find(
    (field) => field.name === label || field.id === label || field.placeholder === label
  );
  return match ? fieldSelector(match) : attributeSelector("name", label);
}

function planWhenStep(step: string, scrape: ScrapeResult): TestAction[] {
  const label = step.match(QUOTED)?.[1];
  const fields = fillableFields(scrape);

  if (EMPTY_STEP.test(step) && label) {
    return [
      { type: "fill", selector: blankFieldSelector(label, fields), value: "", description: step },
    ];
  }

  if (FILL_STEP.test(step)) {
    return fields.map((field) => ({
      type: "fill",
      selector: fieldSelector(field),
      value: sampleValue(field.type),
      description: `${step} (${field.name || field.id})`,
    }));
  }

  if (CLICK_STEP.test(step)) {
    if (label) {
      return [
        {
          type: "click",
          role: LINK_STEP.test(step) ? "link" : "button",
          name: label,
          description: step,
        },
      ];
    }
    if (SUBMIT_STEP.test(step)) {
      return [{ type: "submit", selector: SUBMIT_SELECTOR, description: step }];
    }
  }

  return [];
}

/**
 * Turn one scenario into browser actions. The plan only depends on the
 * scenario text and the scraped page, so the same input always yields the
 * same actions.
 */
export function planScenario(scenario: BDDScenario, scrape: ScrapeResult): TestAction[] {
  const actions: TestAction[] = [
    { type: "navigate", url: scrape.url, description: `Open ${scrape.url}` },
  ];

  for (const step of scenario.when) {
    actions.push(...planWhenStep(step, scrape));
  }

  if (scenario.testType === "performance") {
    const ms = PAGE_LOAD_BUDGET_SECONDS * 1000;
    actions.push({ type: "loadWithin", ms, description: `Page loads within ${ms}ms` });
  }

  if (scenario.then.length > 0) {
    actions.push({ type: "assertVisible", selector: "body", description: scenario.then.join("; ") });
  }

  return actions;
}

export function planFeatures(features: readonly BDDFeature[], scrape: ScrapeResult): PlannedTest[] {
  const tests: PlannedTest[] = [];
  for (const feature of features) {
    for (const scenario of feature.scenarios) {
      tests.push({
        id: `${String(tests.length + 1).padStart(3, "0")}-${slugify(scenario.scenario) || "scenario"}`,
        name: scenario.scenario,
        feature: feature.name,
        skip: scenario.tags.some((tag) => SKIP_TAGS.has(tag)),
        actions: planScenario(scenario, scrape),
      });
    }
  }
  return tests;
}
