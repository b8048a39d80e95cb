import type { ChatCompletionApi } from "../../core/api/chat-completion.js";
import { ConfigError } from "../../core/errors.js";
import type { ResolvedModelCandidate } from "../../types/model.js";
import { OpenAIAdapter, OpenAICompatibleAdapter } from "./openai.js";

const openaiCompatible = new OpenAICompatibleAdapter();
const openai = new OpenAIAdapter();

export function resolveChatCompletionApi(candidate: ResolvedModelCandidate): ChatCompletionApi {
  if (candidate.provider === "openai-compatible") {
    return openaiCompatible.create(candidate);
  }

  if (candidate.provider === "openai") {
    return openai.create(candidate);
  }

  throw new ConfigError(`Unsupported provider: ${(candidate as { provider?: string }).provider ?? "<unknown>"}`);
}
