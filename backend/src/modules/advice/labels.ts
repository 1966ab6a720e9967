import { NO_DEFICIENCY, type KnowledgeBase, type NutrientGuess } from "./knowledge";

export type SeverityTier = "mild" | "moderate" | "severe";

/** "bean_rust" -> "Bean rust". Never throws; empty input gives "Unknown". */
export function normalizeLabel(rawLabel: string): string {
  const label = rawLabel.replace(/_/g, " ").trim();
  if (!label) return "Unknown";
  // first code point, not first UTF-16 unit
  const [first] = label;
  return first.toUpperCase() + label.slice(first.length);
}

export function severityFromScore(score: number): SeverityTier {
  if (score < 0.4) return "mild";
  if (score < 0.7) return "moderate";
  return "severe";
}

export function guessNutrient(label: string, knowledge: KnowledgeBase): NutrientGuess {
  const lower = label.toLowerCase();
  for (const [keyword, nutrient] of knowledge.diseaseToNutrient) {
    if (lower.includes(keyword.toLowerCase())) return nutrient;
  }
  return NO_DEFICIENCY;
}
