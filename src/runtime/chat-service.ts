import type { AppConfig } from "../config/env.js";
import { resolveChatCompletionApi } from "../adapter/api/index.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { ModelRegistry, ResolvedChatProfile, ResolvedModelCandidate } from "../types/model.js";
import type { MessageContent } from "../types/chat.js";
import { loadModelRegistry } from "../models/profile-registry.js";
import { routeChatProfile } from "../models/profile-router.js";
import type { ConversationContext, FragmentObserver } from "./conversation-context.js";
import { createConversation } from "./prompt-presets.js";

/**
 * 파일 목적:
 * - 설정(env + model registry)으로부터 대화 세션과 전송 계층을 조립한다.
 *
 * 주요 의존성:
 * - profile-registry/profile-router: 채팅용 모델/프로필 해석
 * - adapter/api: provider 별 ChatCompletionApi 생성
 * - prompt-presets: system prompt 가 고정된 ConversationContext 생성
 *
 * 역의존성:
 * - src/cli/chat.ts, src/cli/chat-turn.ts, src/cli/chat-tui.ts
 */
export interface ChatSession {
  profile: ResolvedChatProfile;
  context: ConversationContext;
  stream: boolean;
}

export interface ChatSessionOptions {
  onFragment?: FragmentObserver;
  stream?: boolean;
}

function resolveLegacyChatCandidate(config: AppConfig): ResolvedModelCandidate | undefined {
  if (!config.openaiBaseUrl || !config.openaiApiKey || !config.openaiModel) {
    return undefined;
  }
  return {
    id: "legacy-openai-env",
    provider: "openai-compatible",
    baseUrl: config.openaiBaseUrl,
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    temperature: config.openaiTemperature,
  };
}

function legacyProfile(config: AppConfig, model: ResolvedModelCandidate): ResolvedChatProfile {
  return {
    id: "env",
    maxHistory: config.chatMaxHistory,
    stream: config.chatStream,
    model,
    description: "OPENAI_* environment fallback",
  };
}

/**
 * 해석 순서: 지정 프로필(+CHAT_MODEL_ID) -> 첫 프로필 -> OPENAI_* 폴백.
 */
export async function resolveChatProfile(config: AppConfig): Promise<ResolvedChatProfile> {
  const legacy = resolveLegacyChatCandidate(config);

  let registry: ModelRegistry;
  try {
    registry = await loadModelRegistry(config.modelProfilesPath);
  } catch (error) {
    if (legacy) {
      return legacyProfile(config, legacy);
    }
    throw new ConfigError(
      `failed to load model registry (${config.modelProfilesPath}) and no legacy OPENAI_* fallback is configured: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const preferredProfileId = config.chatProfileId.trim() || "default";
  const firstProfileId = Object.keys(registry.profiles)[0];
  const attempts = firstProfileId && firstProfileId !== preferredProfileId
    ? [preferredProfileId, firstProfileId]
    : [preferredProfileId];

  let lastError: unknown;
  for (const profileId of attempts) {
    try {
      return routeChatProfile(registry, profileId, { modelId: config.chatModelId });
    } catch (error) {
      lastError = error;
    }
  }

  if (legacy) {
    return legacyProfile(config, legacy);
  }
  throw new ConfigError(`failed to resolve chat profile (${preferredProfileId}): ${errorMessage(lastError)}`, {
    cause: lastError,
  });
}

/**
 * 프로필 값이 없으면 env 값(CHAT_*)이 기본값으로 쓰인다.
 * SYSTEM_PROMPT 는 프로필/preset 보다 우선한다.
 */
export function createChatSession(
  config: AppConfig,
  profile: ResolvedChatProfile,
  options: ChatSessionOptions = {},
): ChatSession {
  const context = createConversation({
    preset: profile.preset ?? config.chatPreset,
    customPrompt: config.systemPrompt ?? profile.systemPrompt,
    maxHistory: profile.maxHistory ?? config.chatMaxHistory,
    transport: resolveChatCompletionApi(profile.model),
    onFragment: options.onFragment,
    requestOptions: {
      debugEnabled: config.debugLlmRequests,
      debugTag: `chat:${profile.id}`,
    },
  });

  return {
    profile,
    context,
    stream: options.stream ?? profile.stream ?? config.chatStream,
  };
}

export async function openChatSession(config: AppConfig, options: ChatSessionOptions = {}): Promise<ChatSession> {
  const profile = await resolveChatProfile(config);
  return createChatSession(config, profile, options);
}

export async function runTurn(
  session: ChatSession,
  userContent: MessageContent,
  signal?: AbortSignal,
): Promise<string> {
  return session.context.recordTurn(userContent, { stream: session.stream, signal });
}
