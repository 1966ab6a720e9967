export class EmptyPredictionError extends Error {
  code = "EMPTY_PREDICTION" as const;
  constructor() {
    super("Empty predictions from the classification model.");
    this.name = "EmptyPredictionError";
  }
}

export class InferenceTimeoutError extends Error {
  code = "INFERENCE_TIMEOUT" as const;
  constructor(ms: number) {
    super(`Classification did not finish within ${ms} ms.`);
    this.name = "InferenceTimeoutError";
  }
}

export class ModelLoadError extends Error {
  code = "MODEL_LOAD_FAILED" as const;
  constructor(modelId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load classifier '${modelId}': ${reason}`);
    this.name = "ModelLoadError";
  }
}
