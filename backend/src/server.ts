import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { DEFAULT_KNOWLEDGE } from "./modules/advice/knowledge";
import { tempUploadStore } from "./modules/analyze/uploadStore";
import { createHuggingFaceGateway } from "./modules/inference/huggingface";
import { logger } from "./utils/log";

async function main() {
  const env = loadEnv();
  const log = logger("server");

  const gateway = createHuggingFaceGateway({
    modelId: env.HF_MODEL_ID,
    token: env.HF_TOKEN,
    timeoutMs: env.INFERENCE_TIMEOUT_MS,
  });

  const app = createApp({
    gateway,
    uploads: tempUploadStore(),
    knowledge: DEFAULT_KNOWLEDGE,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
  });

  log.info(`Model '${env.HF_MODEL_ID}' will be loaded on the first request`);

  app.listen(env.PORT, "0.0.0.0", () => {
    log.info(`Farm Advisor API listening on port ${env.PORT}`);
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
