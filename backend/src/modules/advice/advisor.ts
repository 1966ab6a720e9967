import { composeAdvice } from "./compose";
import type { KnowledgeBase, NutrientGuess } from "./knowledge";
import { guessNutrient, normalizeLabel } from "./labels";
import { roundHalfEven } from "./rounding";

export type Prediction = {
  label: string;
  score: number;
};

export type Box = [number, number, number, number] | [];

export type AdvisoryRecord = {
  label: string;
  score: number;
  box: Box;
  nutrition: NutrientGuess | "Unknown";
  advice: string;
};

// Classification only: no localization, so every hit gets the same rectangle.
export const PLACEHOLDER_BOX: Box = [50, 50, 200, 200];

export const ANALYSIS_FAILED_ADVICE =
  "An error occurred while analyzing the image. Please try another image.";

export function roundScore(score: number): number {
  return roundHalfEven(score, 5);
}

export function buildAdvisoryRecord(best: Prediction, knowledge: KnowledgeBase): AdvisoryRecord {
  const label = normalizeLabel(best.label);
  const nutrition = guessNutrient(label, knowledge);

  return {
    label,
    score: roundScore(best.score),
    box: [...PLACEHOLDER_BOX],
    nutrition,
    advice: composeAdvice(label, nutrition, best.score, knowledge),
  };
}

export function errorRecord(): AdvisoryRecord {
  return {
    label: "Error",
    score: 0.0,
    box: [],
    nutrition: "Unknown",
    advice: ANALYSIS_FAILED_ADVICE,
  };
}
