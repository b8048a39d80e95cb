import { readFile } from "node:fs/promises";
import { ConfigError } from "../core/errors.js";
import { isPromptPreset } from "../runtime/prompt-presets.js";
import {
  PROVIDER_TYPES,
  type ApiServer,
  type ChatProfileDefinition,
  type ModelDefinition,
  type ModelRegistry,
  type ProviderType,
  type ResolvedModelCandidate,
  type ValueSource,
} from "../types/model.js";

/**
 * 파일 목적:
 * - model-profiles.json 을 읽어 타입이 보장된 ModelRegistry 로 검증한다.
 * - 서버/모델 값의 출처(직접 값 또는 env)를 실제 값으로 해석한다.
 *
 * 역의존성:
 * - models/profile-router.ts, runtime/chat-service.ts, cli/models-list.ts
 */
type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((provider) => provider === value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function requireString(entry: JsonObject, key: string, where: string): string {
  const value = nonEmptyString(entry[key]);
  if (!value) {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalString(entry: JsonObject, key: string, where: string): string | undefined {
  if (entry[key] === undefined) {
    return undefined;
  }
  return requireString(entry, key, where);
}

function optionalNumber(
  entry: JsonObject,
  key: string,
  where: string,
  rule: { min: number; max?: number; integer?: boolean },
): number | undefined {
  const value = entry[key];
  if (value === undefined) {
    return undefined;
  }
  const valid =
    typeof value === "number" &&
    Number.isFinite(value) &&
    value >= rule.min &&
    (rule.max === undefined || value <= rule.max) &&
    (!rule.integer || Number.isInteger(value));
  if (!valid) {
    const range = rule.max === undefined ? `>= ${rule.min}` : `${rule.min}..${rule.max}`;
    throw new ConfigError(`${where}.${key} must be ${rule.integer ? "an integer" : "a number"} ${range}`);
  }
  return value;
}

function optionalBoolean(entry: JsonObject, key: string, where: string): boolean | undefined {
  const value = entry[key];
  if (value === undefined || typeof value === "boolean") {
    return value;
  }
  throw new ConfigError(`${where}.${key} must be true or false`);
}

function optionalObject(entry: JsonObject, key: string, where: string): JsonObject | undefined {
  const value = entry[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new ConfigError(`${where}.${key} must be an object`);
  }
  return value;
}

/** `"literal"` | `{ value }` | `{ env: "NAME" | ["A", "B"] }` */
function parseSource(raw: unknown, where: string): ValueSource {
  const literal = nonEmptyString(raw);
  if (literal) {
    return { value: literal };
  }
  if (isObject(raw)) {
    const value = nonEmptyString(raw.value);
    const envRaw = raw.env;
    const envList: unknown[] = typeof envRaw === "string" ? [envRaw] : Array.isArray(envRaw) ? envRaw : [];
    const env = envList.flatMap((name) => {
      const trimmed = nonEmptyString(name);
      return trimmed ? [trimmed] : [];
    });
    if (value || env.length > 0) {
      return { ...(value ? { value } : {}), ...(env.length > 0 ? { env } : {}) };
    }
  }
  throw new ConfigError(`${where} must be a string or { "env": "NAME" }`);
}

function parseServer(raw: unknown, index: number): ApiServer {
  const where = `servers[${index}]`;
  if (!isObject(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const provider = requireString(raw, "provider", where);
  if (!isProviderType(provider)) {
    throw new ConfigError(`${where}.provider must be one of ${PROVIDER_TYPES.join(", ")}: ${provider}`);
  }
  return {
    id: requireString(raw, "id", where),
    provider,
    baseUrl: parseSource(raw.baseUrl, `${where}.baseUrl`),
    apiKey: parseSource(raw.apiKey, `${where}.apiKey`),
  };
}

function parseModel(raw: unknown, index: number): ModelDefinition {
  const where = `models[${index}]`;
  if (!isObject(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }
  return {
    id: requireString(raw, "id", where),
    serverId: requireString(raw, "serverId", where),
    model: parseSource(raw.model, `${where}.model`),
    temperature: optionalNumber(raw, "temperature", where, { min: 0, max: 2 }),
    maxTokens: optionalNumber(raw, "maxTokens", where, { min: 1, integer: true }),
    extraBody: optionalObject(raw, "extraBody", where),
  };
}

function parseProfile(id: string, raw: unknown): ChatProfileDefinition {
  const where = `profiles.${id}`;
  if (!isObject(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const preset = optionalString(raw, "preset", where);
  if (preset && !isPromptPreset(preset)) {
    throw new ConfigError(`${where}.preset is not a known preset: ${preset}`);
  }
  return {
    modelId: requireString(raw, "modelId", where),
    preset,
    systemPrompt: optionalString(raw, "systemPrompt", where),
    maxHistory: optionalNumber(raw, "maxHistory", where, { min: 0, integer: true }),
    stream: optionalBoolean(raw, "stream", where),
    description: optionalString(raw, "description", where),
  };
}

function assertUniqueIds(kind: string, entries: ReadonlyArray<{ id: string }>): void {
  const seen = new Set<string>();
  for (const { id } of entries) {
    if (seen.has(id)) {
      throw new ConfigError(`duplicate ${kind} id: ${id}`);
    }
    seen.add(id);
  }
}

/**
 * 항목별 타입 검사와 id 참조(model -> server, profile -> model) 검사를 모두 통과해야 한다.
 */
export function validateModelRegistry(parsed: unknown): ModelRegistry {
  if (!isObject(parsed)) {
    throw new ConfigError("model registry must be a JSON object");
  }
  if (!Array.isArray(parsed.servers) || parsed.servers.length === 0) {
    throw new ConfigError("model registry must include at least one server");
  }
  if (!Array.isArray(parsed.models) || parsed.models.length === 0) {
    throw new ConfigError("model registry must include at least one model");
  }
  if (!isObject(parsed.profiles) || Object.keys(parsed.profiles).length === 0) {
    throw new ConfigError("model registry must include at least one chat profile");
  }

  const servers = parsed.servers.map(parseServer);
  const models = parsed.models.map(parseModel);
  const profiles: Record<string, ChatProfileDefinition> = {};
  for (const [id, raw] of Object.entries(parsed.profiles)) {
    profiles[id] = parseProfile(id, raw);
  }

  assertUniqueIds("server", servers);
  assertUniqueIds("model", models);
  for (const model of models) {
    if (!servers.some((server) => server.id === model.serverId)) {
      throw new ConfigError(`model(${model.id}) references unknown server: ${model.serverId}`);
    }
  }
  for (const [id, profile] of Object.entries(profiles)) {
    if (!models.some((model) => model.id === profile.modelId)) {
      throw new ConfigError(`profile(${id}) references unknown model: ${profile.modelId}`);
    }
  }

  return { servers, models, profiles };
}

export async function loadModelRegistry(pathname: string): Promise<ModelRegistry> {
  const raw = await readFile(pathname, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`model registry is not valid JSON (${pathname})`, { cause: error });
  }
  return validateModelRegistry(parsed);
}

function readSource(label: string, source: ValueSource): string {
  const fromEnv = (source.env ?? []).map((name) => nonEmptyString(process.env[name])).find(Boolean);
  const value = source.value ?? fromEnv;
  if (!value) {
    const hint = source.env?.length ? ` (env ${source.env.join(", ")})` : "";
    throw new ConfigError(`Missing ${label}${hint}`);
  }
  return value;
}

export function describeSource(source: ValueSource): string {
  return source.value ?? (source.env ?? []).map((name) => `$${name}`).join("|");
}

export function getChatProfileDefinition(registry: ModelRegistry, profileId: string): ChatProfileDefinition {
  const profile = registry.profiles[profileId];
  if (!profile) {
    throw new ConfigError(`chat profile not found: ${profileId}`);
  }
  return profile;
}

export function resolveModelCandidateById(registry: ModelRegistry, modelId: string): ResolvedModelCandidate {
  const model = registry.models.find((m) => m.id === modelId);
  if (!model) {
    throw new ConfigError(`model not found: ${modelId}`);
  }
  const server = registry.servers.find((s) => s.id === model.serverId);
  if (!server) {
    throw new ConfigError(`server not found for model ${modelId}: ${model.serverId}`);
  }

  return {
    id: model.id,
    provider: server.provider,
    baseUrl: readSource(`server(${server.id}).baseUrl`, server.baseUrl),
    apiKey: readSource(`server(${server.id}).apiKey`, server.apiKey),
    model: readSource(`model(${model.id}).model`, model.model),
    temperature: model.temperature,
    maxTokens: model.maxTokens,
    extraBody: model.extraBody,
  };
}

export function listProfiles(registry: ModelRegistry): Array<{ id: string; value: ChatProfileDefinition }> {
  return Object.entries(registry.profiles).map(([id, value]) => ({ id, value }));
}
