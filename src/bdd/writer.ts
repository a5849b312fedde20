import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { slugify } from "../utils/paths.js";
import { KEYWORDS } from "./keywords.js";
import type { BDDFeature, GherkinLanguage } from "./types.js";

export function renderFeature(feature: BDDFeature, language: GherkinLanguage): string {
  const kw = KEYWORDS[language];
  const lines: string[] = [];

  if (language !== "english") {
    lines.push(`# language: ${kw.code}`);
  }
  if (feature.tags.length > 0) {
    lines.push(feature.tags.join(" "));
  }
  lines.push(`${kw.feature}: ${feature.name}`);
  lines.push(`  ${feature.description}`);
  lines.push("");

  if (feature.background) {
    lines.push(`  ${kw.background}:`);
    lines.push(`    ${kw.given} ${feature.background}`);
    lines.push("");
  }

  for (const scenario of feature.scenarios) {
    if (scenario.tags.length > 0) {
      lines.push(`  ${scenario.tags.join(" ")}`);
    }
    lines.push(`  ${kw.scenario}: ${scenario.scenario}`);

    const blocks: [string, string[]][] = [
      [kw.given, scenario.given],
      [kw.when, scenario.when],
      [kw.then, scenario.then],
    ];
    for (const [keyword, steps] of blocks) {
      steps.forEach((step, i) => {
        lines.push(`    ${i === 0 ? keyword : kw.and} ${step}`);
      });
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function featureFileName(feature: BDDFeature): string {
  return `${slugify(feature.name) || "feature"}.feature`;
}

/**
 * Write one `.feature` file per feature and return the paths, in feature
 * order. Features whose names slug to the same file get a numeric suffix.
 */
export async function writeFeatureFiles(
  features: readonly BDDFeature[],
  dir: string,
  language: GherkinLanguage
): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const used = new Set<string>();
  const paths: string[] = [];

  for (const feature of features) {
    let fileName = featureFileName(feature);
    for (let n = 2; used.has(fileName); n++) {
      fileName = featureFileName(feature).replace(/\.feature$/, `-${n}.feature`);
    }
    used.add(fileName);

    const filePath = join(dir, fileName);
    await writeFile(filePath, renderFeature(feature, language), "utf-8");
    paths.push(filePath);
  }

  return paths;
}
