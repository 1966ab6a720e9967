import { NO_DEFICIENCY, type KnowledgeBase, type NutrientGuess } from "./knowledge";
import { severityFromScore } from "./labels";
import { toFixedHalfEven } from "./rounding";

export const RECHECK_SENTENCE = "Re-check the field in 3–5 days for changes or spreading.";

export function composeAdvice(
  label: string,
  nutrient: NutrientGuess,
  score: number,
  knowledge: KnowledgeBase
): string {
  const severity = severityFromScore(score);
  // exact match only: "Powdery mildew" does not hit "Powdery Mildew"
  const disease = Object.prototype.hasOwnProperty.call(knowledge.diseaseGuide, label)
    ? knowledge.diseaseGuide[label]
    : undefined;
  const remedy = knowledge.nutrientGuide[nutrient] ?? "";

  const parts: string[] = [];

  if (label.toLowerCase().startsWith("healthy")) {
    parts.push("The crop appears healthy.");
    parts.push("No visible signs of stress or disease.");
  } else {
    const summary = disease?.summary ?? `Issue detected: ${label}.`;
    parts.push(`${summary} Severity: **${severity}** (${toFixedHalfEven(score * 100, 1)}% confidence).`);
  }

  if (disease?.fieldAction) parts.push(`Field Action: ${disease.fieldAction}`);

  if (nutrient === NO_DEFICIENCY) {
    parts.push("Nutrient status looks normal. Maintain your current fertilizer plan.");
  } else {
    parts.push(`Possible **${nutrient} deficiency**. ${remedy}`);
  }

  if (disease?.extra) parts.push(`Tip: ${disease.extra}`);

  parts.push(RECHECK_SENTENCE);

  return parts.join(" ");
}
