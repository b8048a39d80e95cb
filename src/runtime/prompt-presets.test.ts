import { describe, expect, it } from "vitest";
import { PRESET_SYSTEM_PROMPTS, createConversation, isPromptPreset, resolvePresetPrompt } from "./prompt-presets.js";

describe("prompt presets", () => {
  it("knows the built-in preset names", () => {
    expect(Object.keys(PRESET_SYSTEM_PROMPTS)).toEqual(["default", "coding", "writing", "analysis", "translator"]);
    expect(isPromptPreset("coding")).toBe(true);
    expect(isPromptPreset("toString")).toBe(false);
  });

  it("falls back to the default prompt for unknown or missing presets", () => {
    expect(resolvePresetPrompt("poetry")).toBe(PRESET_SYSTEM_PROMPTS.default);
    expect(resolvePresetPrompt(undefined)).toBe(PRESET_SYSTEM_PROMPTS.default);
    expect(resolvePresetPrompt("translator")).toBe(PRESET_SYSTEM_PROMPTS.translator);
  });

  it("pins the preset prompt on a new conversation", () => {
    const ctx = createConversation({ preset: "coding", maxHistory: 8 });
    expect(ctx.getSystemPrompt()).toBe(PRESET_SYSTEM_PROMPTS.coding);
    expect(ctx.getMaxHistory()).toBe(8);
    expect(ctx.getHistoryCount()).toBe(0);
  });

  it("prefers a non-blank custom prompt over the preset", () => {
    expect(createConversation({ preset: "coding", customPrompt: "  Reply in haiku.  " }).getSystemPrompt()).toBe(
      "Reply in haiku.",
    );
    expect(createConversation({ preset: "writing", customPrompt: "   " }).getSystemPrompt()).toBe(
      PRESET_SYSTEM_PROMPTS.writing,
    );
  });
});
