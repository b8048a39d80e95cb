export const PROVIDER_TYPES = ["openai-compatible", "openai"] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

/**
 * 설정 값의 출처. `value` 가 있으면 그대로 쓰고, 없으면 `env` 이름을 앞에서부터 읽어
 * 처음으로 비어 있지 않은 값을 쓴다.
 * 파일에서는 문자열 하나(`"gpt-4o"`) 또는 `{ "env": "NAME" | ["A", "B"] }` 로 적는다.
 */
export interface ValueSource {
  value?: string;
  env?: string[];
}

export interface ApiServer {
  id: string;
  provider: ProviderType;
  baseUrl: ValueSource;
  apiKey: ValueSource;
}

export interface ModelDefinition {
  id: string;
  serverId: string;
  model: ValueSource;
  temperature?: number;
  maxTokens?: number;
  extraBody?: Record<string, unknown>;
}

/** 대화 한 종류의 기본값. 비어 있는 항목은 env(CHAT_*) 값으로 채워진다. */
export interface ChatProfileDefinition {
  modelId: string;
  preset?: string;
  systemPrompt?: string;
  maxHistory?: number;
  stream?: boolean;
  description?: string;
}

export interface ModelRegistry {
  servers: ApiServer[];
  models: ModelDefinition[];
  profiles: Record<string, ChatProfileDefinition>;
}

export interface ResolvedModelCandidate {
  id: string;
  provider: ProviderType;
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  extraBody?: Record<string, unknown>;
}

export interface ResolvedChatProfile {
  id: string;
  preset?: string;
  systemPrompt?: string;
  maxHistory?: number;
  stream?: boolean;
  model: ResolvedModelCandidate;
  description?: string;
}

export interface ChatProfileOverride {
  modelId?: string;
  maxHistory?: number;
  stream?: boolean;
}
