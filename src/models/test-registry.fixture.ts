import type { ModelRegistry } from "../types/model.js";

export function sampleRegistry(): ModelRegistry {
  return {
    servers: [
      {
        id: "primary",
        provider: "openai-compatible",
        baseUrl: { env: ["TEST_LLM_URL"] },
        apiKey: { env: ["TEST_LLM_KEY"] },
      },
    ],
    models: [
      { id: "vision", serverId: "primary", model: { env: ["TEST_VISION_MODEL", "TEST_FALLBACK_MODEL"] }, temperature: 0.7 },
      { id: "fixed", serverId: "primary", model: { value: "fixed-model" }, maxTokens: 512 },
    ],
    profiles: {
      default: { modelId: "vision", preset: "coding", maxHistory: 20, stream: true },
      quick: { modelId: "fixed", systemPrompt: "Be terse.", stream: false },
    },
  };
}
