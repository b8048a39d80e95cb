import {
  ConversationContext,
  type ConversationContextOptions,
} from "./conversation-context.js";

export const PRESET_SYSTEM_PROMPTS = {
  default:
    "You are a helpful AI assistant. Answer the user's questions in a friendly, professional way and give accurate, useful information.",
  coding:
    "You are an expert programming assistant. You know many programming languages and help the user write, debug and optimize code, with clear explanations of the code you show.",
  writing:
    "You are a professional writing assistant. You help with drafting, editing, polishing and translating text, and you give concrete suggestions and revisions.",
  analysis:
    "You are a professional data analyst. You analyze data, identify patterns and insights, and suggest clear ways to visualize and explain them.",
  translator:
    "You are a professional translator. You translate accurately and fluently between languages, keep the tone and style of the source, and adapt to context.",
} as const;

export type PromptPreset = keyof typeof PRESET_SYSTEM_PROMPTS;

export function isPromptPreset(value: string): value is PromptPreset {
  return Object.prototype.hasOwnProperty.call(PRESET_SYSTEM_PROMPTS, value);
}

/** 알 수 없는 preset 이름은 default 로 떨어진다. */
export function resolvePresetPrompt(preset: string | undefined): string {
  return preset && isPromptPreset(preset) ? PRESET_SYSTEM_PROMPTS[preset] : PRESET_SYSTEM_PROMPTS.default;
}

export interface CreateConversationOptions extends Omit<ConversationContextOptions, "systemPrompt"> {
  preset?: string;
  customPrompt?: string;
}

/**
 * custom prompt 가 비어 있지 않으면 preset 보다 우선한다.
 */
export function createConversation(options: CreateConversationOptions = {}): ConversationContext {
  const { preset, customPrompt, ...contextOptions } = options;
  const systemPrompt = customPrompt?.trim() || resolvePresetPrompt(preset);
  return new ConversationContext({ ...contextOptions, systemPrompt });
}
