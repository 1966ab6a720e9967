export type NutrientGuess =
  | "Nitrogen"
  | "Phosphorus"
  | "Potassium"
  | "Magnesium"
  | "No deficiency";

export const NO_DEFICIENCY: NutrientGuess = "No deficiency";

export type DiseaseInfo = {
  summary: string;
  fieldAction?: string;
  extra?: string;
};

export type KnowledgeBase = {
  nutrientGuide: Readonly<Record<NutrientGuess, string>>;
  diseaseGuide: Readonly<Record<string, Readonly<DiseaseInfo>>>;
  // Ordered: first keyword found in the label wins.
  diseaseToNutrient: ReadonlyArray<readonly [keyword: string, nutrient: NutrientGuess]>;
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

export const NUTRIENT_GUIDE: KnowledgeBase["nutrientGuide"] = {
  Nitrogen: "Apply a balanced nitrogen source (e.g., Urea or compost) in split doses.",
  Phosphorus: "Use DAP fertilizer closer to the root zone.",
  Potassium: "Apply MOP fertilizer for disease resistance.",
  Magnesium: "Add Epsom salt for chlorophyll production.",
  "No deficiency": "No nutrient deficiency detected; maintain your current schedule.",
};

export const DISEASE_GUIDE: KnowledgeBase["diseaseGuide"] = {
  Healthy: {
    summary: "The crop appears healthy.",
    fieldAction: "Continue your irrigation and fertilizer schedule.",
    extra: "Monitor your field weekly to catch early symptoms.",
  },
  "Powdery Mildew": {
    summary: "White or grayish powder suggests fungal infection.",
    fieldAction: "Remove infected leaves and avoid overhead irrigation.",
    extra: "Improve airflow and consider fungicides if spreading.",
  },
  "Leaf Blast": {
    summary: "Irregular lesions indicate blast disease.",
    fieldAction: "Avoid excess nitrogen; ensure proper drainage.",
    extra: "Use resistant varieties if available.",
  },
  "Bacterial Blight": {
    summary: "Water-soaked lesions and wilting indicate bacterial blight.",
    fieldAction: "Remove infected plants and avoid touching leaves when wet.",
    extra: "Use clean tools and disease-free seeds.",
  },
  "Early Blight": {
    summary: "Brown concentric rings indicate early blight.",
    fieldAction: "Remove affected leaves and reduce moisture duration.",
    extra: "Practice crop rotation and proper spacing.",
  },
};

export const DISEASE_TO_NUTRIENT: KnowledgeBase["diseaseToNutrient"] = [
  ["Healthy", "No deficiency"],
  ["Mildew", "Potassium"],
  ["Blight", "Nitrogen"],
  ["Spot", "Nitrogen"],
  ["Rust", "Potassium"],
];

/**
 * Built once per process and handed to the advisor; never mutated afterwards.
 */
export const DEFAULT_KNOWLEDGE: KnowledgeBase = deepFreeze({
  nutrientGuide: NUTRIENT_GUIDE,
  diseaseGuide: DISEASE_GUIDE,
  diseaseToNutrient: DISEASE_TO_NUTRIENT,
});
