import type { BddSettings } from "../config/schema.js";
import type { HtmlAnalysis } from "./analysis.js";

export const HTML_PREVIEW_LENGTH = 2000;

export function buildAnalysisPrompt(url: string, html: string): string {
  return `Analyze the following HTML and identify the elements that can be tested.

URL: ${url}
HTML (first ${HTML_PREVIEW_LENGTH} characters):
${html.slice(0, HTML_PREVIEW_LENGTH)}

Identify:
1. Forms and their input fields
2. Clickable elements (buttons, links)
3. Fields that require data entry
4. Fields that need validation checks
5. Page navigation

Respond with JSON only, in this shape:
{
  "forms": [{
    "id": "form_id",
    "action": "form_action",
    "method": "POST or GET",
    "fields": [{
      "name": "field_name",
      "type": "text/email/password/etc",
      "required": true,
      "validation": "validation_rule"
    }]
  }],
  "buttons": [{ "id": "button_id", "text": "button_text", "action": "click_action" }],
  "links": [{ "href": "link_url", "text": "link_text" }],
  "navigation": [{ "menu_item": "menu_name", "url": "menu_url" }]
}`;
}

const LANGUAGE_HINTS: Record<BddSettings["language"], string> = {
  english: "Write the scenarios in English Gherkin (Feature, Scenario, Given, When, Then, And).",
  turkish:
    "Write the scenarios in Turkish Gherkin (Özellik, Senaryo, Diyelim ki, Eğer, O zaman, Ve).",
};

function summarizeAnalysis(analysis: HtmlAnalysis): string {
  if (analysis.source === "raw") {
    return analysis.rawResponse?.slice(0, 1500) ?? "";
  }
  const lines: string[] = [];
  for (const form of analysis.forms) {
    const fields = form.fields
      .map((f) => `${f.name || "?"} (${f.type}${f.required ? ", required" : ""})`)
      .join(", ");
    lines.push(`- Form "${form.id || "unnamed"}" ${form.method}: ${fields}`);
  }
  for (const button of analysis.buttons) {
    lines.push(`- Button "${button.text || button.id}"`);
  }
  for (const link of analysis.links.slice(0, 10)) {
    lines.push(`- Link "${link.text}" -> ${link.href}`);
  }
  for (const item of analysis.navigation) {
    lines.push(`- Menu "${item.menu_item}" -> ${item.url}`);
  }
  return lines.join("\n");
}

export function buildBddPrompt(analysis: HtmlAnalysis, settings: BddSettings): string {
  const extras: string[] = [];
  if (settings.include_negative_tests) {
    extras.push("- Include negative scenarios (invalid input, missing required fields).");
  }
  if (settings.include_performance_tests) {
    extras.push("- Include a scenario that checks the page loads quickly.");
  }

  return `Create ${settings.scenario_count} BDD test scenarios for this web page.

## Testable elements
${summarizeAnalysis(analysis) || "- (no structured elements detected)"}

## Rules
- ${LANGUAGE_HINTS[settings.language]}
- Start every feature with "Feature:" and every scenario with "Scenario:".
- Put each step on its own line.
${extras.join("\n")}

Return ONLY the Gherkin text.`;
}
