import { getChatProfileDefinition, resolveModelCandidateById } from "./profile-registry.js";
import type { ChatProfileOverride, ModelRegistry, ResolvedChatProfile } from "../types/model.js";

export function routeChatProfile(
  registry: ModelRegistry,
  profileId: string,
  override?: ChatProfileOverride,
): ResolvedChatProfile {
  const profile = getChatProfileDefinition(registry, profileId);
  const model = resolveModelCandidateById(registry, override?.modelId ?? profile.modelId);

  return {
    id: profileId,
    preset: profile.preset,
    systemPrompt: profile.systemPrompt,
    maxHistory: override?.maxHistory ?? profile.maxHistory,
    stream: override?.stream ?? profile.stream,
    model,
    description: profile.description,
  };
}
