import { config as loadDotenv } from "dotenv";

loadDotenv();

function getNumberEnv(name: string, fallback: number, options: { allowZero?: boolean } = {}): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return parsed > 0 || (options.allowZero === true && parsed === 0) ? parsed : fallback;
}

function getBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

export interface AppConfig {
  openaiBaseUrl?: string;
  openaiApiKey?: string;
  openaiModel?: string;
  openaiTemperature: number;
  systemPrompt?: string;
  chatPreset: string;
  chatMaxHistory: number;
  chatStream: boolean;
  chatProfileId: string;
  chatModelId?: string;
  modelProfilesPath: string;
  chatLogDir: string;
  debugLlmRequests: boolean;
}

export function loadConfig(): AppConfig {
  return {
    openaiBaseUrl: process.env.OPENAI_BASE_URL?.trim() || undefined,
    openaiApiKey: process.env.OPENAI_API_KEY?.trim() || undefined,
    openaiModel: process.env.OPENAI_MODEL?.trim() || undefined,
    openaiTemperature: getNumberEnv("OPENAI_TEMPERATURE", 0.7, { allowZero: true }),
    systemPrompt: process.env.SYSTEM_PROMPT?.trim() || undefined,
    chatPreset: process.env.CHAT_PRESET?.trim() || "default",
    chatMaxHistory: Math.floor(getNumberEnv("CHAT_MAX_HISTORY", 50, { allowZero: true })),
    chatStream: getBooleanEnv("CHAT_STREAM", true),
    chatProfileId: process.env.CHAT_PROFILE_ID?.trim() || "default",
    chatModelId: process.env.CHAT_MODEL_ID?.trim() || undefined,
    modelProfilesPath: process.env.MODEL_PROFILES_PATH?.trim() || "./config/model-profiles.json",
    chatLogDir: process.env.CHAT_LOG_DIR?.trim() || "./data/logs",
    debugLlmRequests: getBooleanEnv("DEBUG_LLM_REQUESTS", false),
  };
}
