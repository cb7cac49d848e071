import type { ModelId } from "../types.js";

export type ModelInfo = {
  id: ModelId;
  name: string;
  description: string;
};

export const VALID_MODELS = ["sonar", "sonar-pro", "sonar-reasoning"] as const;

export const MODELS: readonly ModelInfo[] = [
  { id: "sonar", name: "Sonar", description: "General-purpose search model" },
  { id: "sonar-pro", name: "Sonar Pro", description: "Enhanced search with more sources" },
  {
    id: "sonar-reasoning",
    name: "Sonar Reasoning",
    description: "Logic-focused model that shows its reasoning",
  },
];

export const DEFAULT_MODEL: ModelId = "sonar";

export function isValidModel(model: string): model is ModelId {
  return VALID_MODELS.some((id) => id === model);
}
