import type { Prediction } from "../advice/advisor";
import { EmptyPredictionError, InferenceTimeoutError } from "./errors";

export interface ClassificationGateway {
  readonly modelId: string;
  classify(imagePath: string): Promise<Prediction[]>;
  isLoaded(): boolean;
}

/** Highest score wins; on a tie the earlier entry is kept. */
export function pickTopPrediction(predictions: Prediction[]): Prediction {
  if (predictions.length === 0) throw new EmptyPredictionError();

  let best = predictions[0];
  for (const p of predictions.slice(1)) {
    if (p.score > best.score) best = p;
  }
  return best;
}

export async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  if (ms <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new InferenceTimeoutError(ms)), ms);
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/** Coerces loosely-typed model output into predictions. */
export function toPredictions(raw: ReadonlyArray<{ label?: unknown; score?: unknown }>): Prediction[] {
  return raw.map((o) => {
    const score = Number(o.score ?? 0);
    return {
      label: o.label === undefined || o.label === null ? "Unknown" : String(o.label),
      score: Number.isFinite(score) ? score : 0,
    };
  });
}
