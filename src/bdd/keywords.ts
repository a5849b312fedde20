import type { GherkinLanguage } from "./types.js";

export interface GherkinKeywords {
  code: string;
  feature: string;
  background: string;
  scenario: string;
  given: string;
  when: string;
  then: string;
  and: string;
}

export const KEYWORDS: Record<GherkinLanguage, GherkinKeywords> = {
  english: {
    code: "en",
    feature: "Feature",
    background: "Background",
    scenario: "Scenario",
    given: "Given",
    when: "When",
    then: "Then",
    and: "And",
  },
  turkish: {
    code: "tr",
    feature: "Özellik",
    background: "Geçmiş",
    scenario: "Senaryo",
    given: "Diyelim ki",
    when: "Eğer ki",
    then: "O zaman",
    and: "Ve",
  },
};
