import request from "supertest";
import { createApp } from "../../app";
import type { Prediction } from "../advice/advisor";
import { DEFAULT_KNOWLEDGE } from "../advice/knowledge";
import type { ClassificationGateway } from "../inference/gateway";
import type { UploadStore } from "./uploadStore";

type Harness = {
  saved: string[];
  removed: string[];
  classified: string[];
};

function setup(opts: {
  predictions?: Prediction[];
  classifyError?: Error;
  saveError?: Error;
  removeError?: Error;
  maxUploadBytes?: number;
} = {}) {
  const h: Harness = { saved: [], removed: [], classified: [] };

  const gateway: ClassificationGateway = {
    modelId: "test-org/leaf-model",
    async classify(imagePath) {
      h.classified.push(imagePath);
      if (opts.classifyError) throw opts.classifyError;
      return opts.predictions ?? [];
    },
    isLoaded: () => h.classified.length > 0,
  };

  const uploads: UploadStore = {
    async save(_data, originalName) {
      if (opts.saveError) throw opts.saveError;
      const p = `/tmp/test-upload-${h.saved.length}-${originalName}`;
      h.saved.push(p);
      return p;
    },
    async remove(filePath) {
      if (opts.removeError) throw opts.removeError;
      h.removed.push(filePath);
    },
  };

  const app = createApp({
    gateway,
    uploads,
    knowledge: DEFAULT_KNOWLEDGE,
    maxUploadBytes: opts.maxUploadBytes ?? 1_000_000,
  });

  return { app, h };
}

const leaf = Buffer.from("not really a jpeg");
const ERROR_RECORD = {
  label: "Error",
  score: 0,
  box: [],
  nutrition: "Unknown",
  advice: "An error occurred while analyzing the image. Please try another image.",
};

function analyze(app: ReturnType<typeof setup>["app"], contentType = "image/jpeg", filename = "leaf.jpg") {
  return request(app).post("/analyze").attach("file", leaf, { filename, contentType });
}

describe("GET /", () => {
  it("reports service status", async () => {
    const { app } = setup();
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", service: "Farm Advisor API" });
  });

  it("allows cross-origin callers", async () => {
    const { app } = setup();
    const res = await request(app).get("/").set("Origin", "http://localhost:3000");

    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });
});

describe("GET /health", () => {
  it("reports the configured model and whether it has loaded", async () => {
    const { app } = setup();
    const res = await request(app).get("/health");

    expect(res.body).toEqual({ ok: true, model: "test-org/leaf-model", modelLoaded: false });
  });
});

describe("POST /analyze", () => {
  it("returns one advisory record for the best prediction", async () => {
    const { app, h } = setup({
      predictions: [
        { label: "healthy", score: 0.1 },
        { label: "bean_rust", score: 0.82 },
      ],
    });

    const res = await analyze(app);

    expect(res.status).toBe(200);
    expect(res.body).toEqual([
      {
        label: "Bean rust",
        score: 0.82,
        box: [50, 50, 200, 200],
        nutrition: "Potassium",
        advice:
          "Issue detected: Bean rust. Severity: **severe** (82.0% confidence). " +
          "Possible **Potassium deficiency**. Apply MOP fertilizer for disease resistance. " +
          "Re-check the field in 3–5 days for changes or spreading.",
      },
    ]);
    expect(h.saved).toEqual(["/tmp/test-upload-0-leaf.jpg"]);
    expect(h.classified).toEqual(h.saved);
    expect(h.removed).toEqual(h.saved);
  });

  it("echoes a request id header", async () => {
    const { app } = setup({ predictions: [{ label: "healthy", score: 0.9 }] });
    const res = await analyze(app).set("x-request-id", "req-123");

    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("rejects non-image uploads before saving anything", async () => {
    const { app, h } = setup({ predictions: [{ label: "healthy", score: 0.9 }] });

    const res = await analyze(app, "text/plain", "notes.txt");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ detail: "Only image uploads are supported." });
    expect(h.saved).toEqual([]);
    expect(h.classified).toEqual([]);
  });

  it("rejects requests without a file", async () => {
    const { app, h } = setup();

    const res = await request(app).post("/analyze").field("note", "no image");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ detail: "No file uploaded." });
    expect(h.saved).toEqual([]);
  });

  it("answers 200 with the error record when the model returns nothing", async () => {
    const { app, h } = setup({ predictions: [] });

    const res = await analyze(app);

    expect(res.status).toBe(200);
    expect(res.body).toEqual([ERROR_RECORD]);
    expect(h.removed).toEqual(h.saved);
  });

  it("answers 200 with the error record when classification fails", async () => {
    const { app, h } = setup({ classifyError: new Error("model unavailable") });

    const res = await analyze(app);

    expect(res.status).toBe(200);
    expect(res.body).toEqual([ERROR_RECORD]);
    expect(h.removed).toEqual(["/tmp/test-upload-0-leaf.jpg"]);
  });

  it("answers 200 with the error record when the upload cannot be saved", async () => {
    const { app, h } = setup({ saveError: new Error("disk full") });

    const res = await analyze(app);

    expect(res.status).toBe(200);
    expect(res.body).toEqual([ERROR_RECORD]);
    expect(h.classified).toEqual([]);
    expect(h.removed).toEqual([]);
  });

  it("still answers when the temp file cannot be removed", async () => {
    const { app } = setup({
      predictions: [{ label: "Healthy", score: 0.97 }],
      removeError: new Error("busy"),
    });

    const res = await analyze(app);

    expect(res.status).toBe(200);
    expect(res.body[0].label).toBe("Healthy");
    expect(res.body[0].nutrition).toBe("No deficiency");
  });

  it("refuses uploads over the size limit", async () => {
    const { app, h } = setup({ maxUploadBytes: 4 });

    const res = await analyze(app);

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: "File too large" });
    expect(h.saved).toEqual([]);
  });
});
