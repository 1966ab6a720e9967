import { HfInference } from "@huggingface/inference";
import sharp from "sharp";
import type { Prediction } from "../advice/advisor";
import { logger } from "../../utils/log";
import { ModelLoadError } from "./errors";
import { toPredictions, withTimeout, type ClassificationGateway } from "./gateway";
import { lazyOnce } from "./once";

type RawOutput = ReadonlyArray<{ label?: unknown; score?: unknown }>;

/** The slice of the Hugging Face client this service calls. */
export interface ImageClassifier {
  imageClassification(args: { model: string; data: Blob }): Promise<RawOutput>;
}

export type HuggingFaceGatewayOptions = {
  modelId: string;
  token?: string;
  timeoutMs?: number;
  createClient?: (token: string | undefined) => ImageClassifier | Promise<ImageClassifier>;
  decodeImage?: (imagePath: string) => Promise<Buffer>;
};

/** Decodes any format sharp reads and re-encodes it as 3-channel sRGB JPEG. */
export async function decodeToRgbJpeg(imagePath: string): Promise<Buffer> {
  // no EXIF auto-orient: the model sees the pixels as stored
  return sharp(imagePath)
    .toColourspace("srgb")
    .removeAlpha()
    .jpeg({ quality: 95 })
    .toBuffer();
}

export function createHuggingFaceGateway(opts: HuggingFaceGatewayOptions): ClassificationGateway {
  const log = logger("HF");
  const createClient = opts.createClient ?? ((token) => new HfInference(token));
  const decodeImage = opts.decodeImage ?? decodeToRgbJpeg;
  const timeoutMs = opts.timeoutMs ?? 0;

  // Set only once the model has answered; building the client never reaches it.
  let ready = false;

  const model = lazyOnce(async () => {
    log.info(`Loading classifier for '${opts.modelId}' ...`);
    try {
      return await createClient(opts.token);
    } catch (e) {
      throw new ModelLoadError(opts.modelId, e);
    }
  });

  async function run(imagePath: string): Promise<Prediction[]> {
    const client = await model.get();
    const image = await decodeImage(imagePath);

    let raw: RawOutput;
    try {
      raw = await client.imageClassification({
        model: opts.modelId,
        data: new Blob([image], { type: "image/jpeg" }),
      });
    } catch (e) {
      if (!ready) throw new ModelLoadError(opts.modelId, e);
      throw e;
    }

    if (!ready) {
      ready = true;
      log.info("Classifier ready.");
    }
    log.info(`Raw outputs: ${JSON.stringify(raw)}`);

    return toPredictions(raw);
  }

  return {
    modelId: opts.modelId,
    classify(imagePath) {
      return withTimeout(run(imagePath), timeoutMs);
    },
    isLoaded() {
      return ready;
    },
  };
}
