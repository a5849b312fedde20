import type { AIAnalysisResult } from "../ai/types.js";
import type { BddSettings } from "../config/schema.js";
import type { ScrapeResult } from "../scraper/types.js";
import { log } from "../utils/logger.js";
import { parseGherkin, uniqueTags } from "./parser.js";
import type { BDDFeature, BDDScenario, FeatureGenerator } from "./types.js";
import { writeFeatureFiles } from "./writer.js";

export const PAGE_LOAD_BUDGET_SECONDS = 5;
const MAX_NAVIGATION_SCENARIOS = 5;
const NON_DATA_FIELD_TYPES = new Set(["submit", "button", "reset", "hidden", "image"]);
const SKIPPED_LINK_PREFIXES = ["javascript:", "mailto:", "tel:"];

interface FormSpec {
  name: string;
  fields: { name: string; type: string; required: boolean }[];
}

interface LinkSpec {
  text: string;
  href: string;
}

export class BddGenerator implements FeatureGenerator {
  constructor(private readonly settings: BddSettings) {}

  generateFeatures(scrape: ScrapeResult, analysis: AIAnalysisResult): BDDFeature[] {
    const parsed = parseGherkin(analysis.bddContent);
    const generated = [
      ...this.formScenarios(collectForms(scrape, analysis)),
      ...navigationScenarios(collectLinks(scrape, analysis)),
      ...buttonScenarios(collectButtons(scrape, analysis)),
      ...(this.settings.include_performance_tests ? [performanceScenario()] : []),
    ];

    const features = groupByFeature([...parsed, ...generated]);
    const total = features.reduce((sum, f) => sum + f.scenarios.length, 0);
    log.debug(
      `Parsed ${parsed.length} AI scenarios, generated ${generated.length} from page structure`
    );
    log.info(`Generated ${features.length} BDD features with ${total} scenarios`);
    return features;
  }

  writeFeatureFiles(features: readonly BDDFeature[], dir: string): Promise<string[]> {
    return writeFeatureFiles(features, dir, this.settings.language);
  }

  private formScenarios(forms: FormSpec[]): BDDScenario[] {
    const scenarios: BDDScenario[] = [];

    for (const form of forms) {
      if (form.fields.length === 0) continue;
      const feature = formFeatureName(form.name);
      const context = `User is on the page containing the "${form.name}" form`;

      scenarios.push({
        feature,
        scenario: `Fill in and submit the "${form.name}" form successfully`,
        given: [context],
        when: ["User fills all required fields with valid data", "User clicks the submit button"],
        then: ["The form is submitted successfully", "A success message is displayed"],
        tags: ["@form", "@positive"],
        priority: "high",
        testType: "functional",
      });

      if (!this.settings.include_negative_tests) continue;

      const required = form.fields.filter((field) => field.required);
      for (const field of required) {
        scenarios.push({
          feature,
          scenario: `Leaving "${field.name}" empty shows a validation error`,
          given: [context],
          when: [
            "User fills all required fields with valid data",
            `User leaves the "${field.name}" field empty`,
            "User clicks the submit button",
          ],
          then: ["The form is not submitted", `An error message is shown for "${field.name}"`],
          tags: ["@form", "@validation", "@negative"],
          priority: "medium",
          testType: "validation",
        });
      }

      if (required.length === 0) {
        scenarios.push({
          feature,
          scenario: `Submitting the "${form.name}" form with invalid data shows an error`,
          given: [context],
          when: ["User fills the form with invalid data", "User clicks the submit button"],
          then: ["The form is not submitted", "An error message is displayed"],
          tags: ["@form", "@validation", "@negative"],
          priority: "medium",
          testType: "validation",
        });
      }
    }

    return scenarios;
  }
}

/** Each form's positive and negative scenarios share one feature. */
export function formFeatureName(formName: string): string {
  return `Form: ${formName}`;
}

/**
 * Scraped forms first, then forms the model found that the scrape did not.
 */
function collectForms(scrape: ScrapeResult, analysis: AIAnalysisResult): FormSpec[] {
  const forms: FormSpec[] = [];
  const seen = new Set<string>();

  scrape.forms.forEach((form, i) => {
    const name = form.id || form.name || `form_${i + 1}`;
    seen.add(name);
    forms.push({
      name,
      fields: form.fields
        .filter((field) => !NON_DATA_FIELD_TYPES.has(field.type.toLowerCase()))
        .map((field) => ({
          name: field.name || field.id || field.type,
          type: field.type,
          required: field.required,
        })),
    });
  });

  analysis.htmlAnalysis.forms.forEach((form, i) => {
    const name = form.id || `form_${scrape.forms.length + i + 1}`;
    if (seen.has(name)) return;
    seen.add(name);
    forms.push({
      name,
      fields: form.fields
        .filter((field) => !NON_DATA_FIELD_TYPES.has(field.type.toLowerCase()))
        .map((field) => ({ name: field.name || field.type, type: field.type, required: field.required })),
    });
  });

  return forms;
}

function isInternal(href: string, pageUrl: string): boolean {
  try {
    return new URL(href, pageUrl).host === new URL(pageUrl).host;
  } catch {
    return false;
  }
}

function collectLinks(scrape: ScrapeResult, analysis: AIAnalysisResult): LinkSpec[] {
  const candidates: (LinkSpec & { external: boolean })[] = [
    ...scrape.links.map((link) => ({ text: link.text, href: link.href, external: link.isExternal })),
    ...analysis.htmlAnalysis.links.map((link) => ({
      text: link.text,
      href: link.href,
      external: !isInternal(link.href, scrape.url),
    })),
  ];

  const links: LinkSpec[] = [];
  const seen = new Set<string>();
  for (const link of candidates) {
    if (!link.href || !link.text || link.external) continue;
    if (SKIPPED_LINK_PREFIXES.some((prefix) => link.href.toLowerCase().startsWith(prefix))) continue;
    if (seen.has(link.href)) continue;
    seen.add(link.href);
    links.push({ text: link.text, href: link.href });
    if (links.length === MAX_NAVIGATION_SCENARIOS) break;
  }
  return links;
}

function collectButtons(scrape: ScrapeResult, analysis: AIAnalysisResult): string[] {
  const labels: string[] = [];
  for (const button of scrape.buttons) {
    if (!button.text || button.type === "submit") continue;
    labels.push(button.text);
  }
  for (const button of analysis.htmlAnalysis.buttons) {
    if (!button.text) continue;
    labels.push(button.text);
  }
  return [...new Set(labels)];
}

function navigationScenarios(links: LinkSpec[]): BDDScenario[] {
  return links.map((link) => ({
    feature: "Navigation",
    scenario: `Clicking the "${link.text}" link`,
    given: ["User is on the page"],
    when: [`User clicks the "${link.text}" link`],
    then: ["A new page loads", "The page is displayed successfully"],
    tags: ["@navigation", "@link"],
    priority: "low",
    testType: "functional",
  }));
}

function buttonScenarios(labels: string[]): BDDScenario[] {
  return labels.map((label) => ({
    feature: "Button Interactions",
    scenario: `Clicking the "${label}" button`,
    given: ["User is on the page"],
    when: [`User clicks the "${label}" button`],
    then: ["The click is handled", "The expected action is performed"],
    tags: ["@button", "@interaction"],
    priority: "medium",
    testType: "functional",
  }));
}

function performanceScenario(): BDDScenario {
  return {
    feature: "Performance",
    scenario: "Page loads within the expected time",
    given: ["User has the page address"],
    when: ["User opens the page"],
    then: [`The page finishes loading within ${PAGE_LOAD_BUDGET_SECONDS} seconds`],
    tags: ["@performance"],
    priority: "medium",
    testType: "performance",
  };
}

export function groupByFeature(scenarios: readonly BDDScenario[]): BDDFeature[] {
  const features = new Map<string, BDDFeature>();

  for (const scenario of scenarios) {
    let feature = features.get(scenario.feature);
    if (!feature) {
      feature = {
        name: scenario.feature,
        description: `Scenarios covering ${scenario.feature}`,
        scenarios: [],
        tags: ["@automated"],
      };
      features.set(scenario.feature, feature);
    }
    feature.scenarios.push({ ...scenario, tags: uniqueTags(scenario.tags) });
  }

  return [...features.values()];
}
