import type { BDDScenario } from "./types.js";

export const DEFAULT_FEATURE_NAME = "AI Generated Scenarios";

const FEATURE_LINE = /^(?:Feature|Özellik):\s*(.*)$/i;
const SCENARIO_LINE = /^(?:Scenario Outline|Scenario|Senaryo Taslağı|Senaryo):\s*(.*)$/i;
const BACKGROUND_LINE = /^(?:Background|Geçmiş|Arka Plan):/i;
const GIVEN_STEP = /^(?:Given|Diyelim ki)\s+(.+)$/i;
const WHEN_STEP = /^(?:When|Eğer ki|Eğer)\s+(.+)$/i;
const THEN_STEP = /^(?:Then|O zaman)\s+(.+)$/i;
const AND_STEP = /^(?:And|But|Ve|Fakat|Ama)\s+(.+)$/i;

type StepKind = "given" | "when" | "then";

/**
 * Parse Gherkin-like text returned by a model into scenarios.
 *
 * Accepts English and Turkish keywords:
 *
 *   Feature: Login
 *     @smoke
 *     Scenario: Valid credentials
 *       Given the user is on the login page
 *       When the user submits valid credentials
 *       And the user clicks "Sign in"
 *       Then the dashboard is shown
 *
 * Lines are trimmed and may carry markdown headings, bullets or emphasis. Scenarios
 * that appear before any Feature line are grouped under a default feature.
 * Background blocks are skipped.
 */
export function parseGherkin(text: string): BDDScenario[] {
  const scenarios: BDDScenario[] = [];
  let feature = DEFAULT_FEATURE_NAME;
  let current: BDDScenario | undefined;
  let currentStep: StepKind | undefined;
  let pendingTags: string[] = [];
  let inBackground = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = cleanLine(rawLine);
    if (!line) continue;

    const featureMatch = line.match(FEATURE_LINE);
    if (featureMatch) {
      feature = featureMatch[1].trim() || DEFAULT_FEATURE_NAME;
      current = undefined;
      inBackground = false;
      pendingTags = [];
      continue;
    }

    if (BACKGROUND_LINE.test(line)) {
      current = undefined;
      inBackground = true;
      continue;
    }

    if (line.startsWith("@")) {
      pendingTags.push(...line.split(/\s+/).filter((tag) => tag.startsWith("@")));
      continue;
    }

    const scenarioMatch = line.match(SCENARIO_LINE);
    if (scenarioMatch) {
      current = {
        feature,
        scenario: scenarioMatch[1].trim(),
        given: [],
        when: [],
        then: [],
        tags: uniqueTags(["@automated", "@ai-generated", ...pendingTags]),
        priority: "medium",
        testType: "functional",
      };
      scenarios.push(current);
      currentStep = undefined;
      pendingTags = [];
      inBackground = false;
      continue;
    }

    if (!current || inBackground) continue;

    const step = classifyStep(line, currentStep);
    if (step) {
      current[step.kind].push(step.text);
      currentStep = step.kind;
    }
  }

  return scenarios;
}

function classifyStep(
  line: string,
  previous: StepKind | undefined
): { kind: StepKind; text: string } | undefined {
  const given = line.match(GIVEN_STEP);
  if (given) return { kind: "given", text: given[1].trim() };

  const when = line.match(WHEN_STEP);
  if (when) return { kind: "when", text: when[1].trim() };

  const then = line.match(THEN_STEP);
  if (then) return { kind: "then", text: then[1].trim() };

  const and = line.match(AND_STEP);
  if (and && previous) return { kind: previous, text: and[1].trim() };

  return undefined;
}

function cleanLine(line: string): string {
  return line
    .trim()
    .replace(/^#{1,6}\s+/, "")
    .replace(/^[-*]\s+/, "")
    .replace(/\*\*/g, "")
    .trim();
}

export function uniqueTags(tags: readonly string[]): string[] {
  return [...new Set(tags)];
}
