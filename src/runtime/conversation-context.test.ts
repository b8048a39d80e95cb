import { describe, it, expect, vi } from "vitest";
import type { ChatCompletionApi, CompletionRequest, StreamHandler } from "../core/api/chat-completion.js";
import {
  TransportFailureError,
  TransportUnavailableError,
  TurnCancelledError,
  TurnInProgressError,
} from "../core/errors.js";
import type { ChatCompletionResponse, ChatMessage } from "../types/chat.js";
import { ContextState, ConversationContext } from "./conversation-context.js";

interface Script {
  reply?: string;
  fragments?: string[];
  error?: Error;
  beforeToken?: (index: number) => void;
}

class FakeTransport implements ChatCompletionApi {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: Script = {}) {}

  async complete(request: CompletionRequest): Promise<ChatCompletionResponse> {
    this.requests.push(request);
    if (this.script.error) {
      throw this.script.error;
    }
    return { content: this.script.reply ?? "", raw: {} };
  }

  async stream(request: CompletionRequest, handlers?: StreamHandler): Promise<ChatCompletionResponse> {
    this.requests.push(request);
    const fragments = this.script.fragments ?? [];
    for (const [index, fragment] of fragments.entries()) {
      this.script.beforeToken?.(index);
      handlers?.onToken?.(fragment);
    }
    if (this.script.error) {
      throw this.script.error;
    }
    return { content: fragments.join(""), raw: { streamed: true } };
  }
}

function text(role: ChatMessage["role"], content: string): ChatMessage {
  return { role, content };
}

function contents(ctx: ConversationContext): string[] {
  return ctx.getMessages().map((m) => (typeof m.content === "string" ? m.content : "<parts>"));
}

describe("ConversationContext system prompt", () => {
  it("reports no system prompt on an empty context", () => {
    const ctx = new ConversationContext();
    expect(ctx.getSystemPrompt()).toBeUndefined();
    expect(ctx.describeState()).toBe(ContextState.Empty);
  });

  it("inserts the system prompt at index 0 ahead of existing messages", () => {
    const ctx = new ConversationContext();
    ctx.append("user", "hi");
    ctx.setSystemPrompt("S");

    expect(ctx.getMessages()).toEqual([text("system", "S"), text("user", "hi")]);
    expect(ctx.getSystemPrompt()).toBe("S");
  });

  it("replaces an existing system prompt in place", () => {
    const ctx = new ConversationContext({ systemPrompt: "S" });
    ctx.append("user", "hi");
    ctx.setSystemPrompt("T");
    ctx.setSystemPrompt("T");

    expect(ctx.getMessages()).toEqual([text("system", "T"), text("user", "hi")]);
  });

  it("moves between states as the history changes", () => {
    const ctx = new ConversationContext({ systemPrompt: "S" });
    expect(ctx.describeState()).toBe(ContextState.SystemOnly);

    ctx.append("user", "u1");
    expect(ctx.describeState()).toBe(ContextState.History);

    ctx.clear();
    expect(ctx.describeState()).toBe(ContextState.SystemOnly);

    ctx.clear(false);
    expect(ctx.describeState()).toBe(ContextState.Empty);
  });
});

describe("ConversationContext trimming", () => {
  it("drops the oldest user/assistant pair when a system prompt is pinned", () => {
    const ctx = new ConversationContext({ systemPrompt: "S", maxHistory: 2 });
    ctx.append("user", "u1");
    ctx.append("assistant", "a1");
    expect(contents(ctx)).toEqual(["S", "u1", "a1"]);

    ctx.append("user", "u2");
    expect(contents(ctx)).toEqual(["S", "u2"]);

    ctx.append("assistant", "a2");
    expect(contents(ctx)).toEqual(["S", "u2", "a2"]);

    ctx.append("user", "u3");
    expect(contents(ctx)).toEqual(["S", "u3"]);
    expect(ctx.getMessages()[1]?.role).toBe("user");
  });

  it("drops a single oldest message when no system prompt is pinned", () => {
    const ctx = new ConversationContext({ maxHistory: 2 });
    ctx.append("user", "m1");
    ctx.append("assistant", "m2");
    ctx.append("user", "m3");
    expect(contents(ctx)).toEqual(["m1", "m2", "m3"]);

    ctx.append("assistant", "m4");
    expect(contents(ctx)).toEqual(["m2", "m3", "m4"]);
  });

  it("never trims on silent appends", () => {
    const ctx = new ConversationContext({ systemPrompt: "S", maxHistory: 1 });
    ctx.append("user", "u1", true);
    ctx.append("assistant", "a1", true);
    ctx.append("user", "u2", true);

    expect(contents(ctx)).toEqual(["S", "u1", "a1", "u2"]);
  });

  it("removes only one turn per append after silent appends overflowed the bound", () => {
    const ctx = new ConversationContext({ systemPrompt: "S", maxHistory: 2 });
    ctx.append("user", "u1");
    ctx.append("assistant", "a1");
    ctx.append("user", "x", true);
    ctx.append("assistant", "y", true);
    expect(contents(ctx)).toEqual(["S", "u1", "a1", "x", "y"]);

    ctx.append("user", "z");
    expect(contents(ctx)).toEqual(["S", "x", "y", "z"]);

    ctx.append("assistant", "w");
    expect(contents(ctx)).toEqual(["S", "z", "w"]);
  });

  it("keeps a lone non-system message even when the bound is zero", () => {
    const ctx = new ConversationContext({ systemPrompt: "S", maxHistory: 0 });
    ctx.append("user", "u");

    expect(contents(ctx)).toEqual(["S", "u"]);
    expect(ctx.getHistoryCount()).toBe(1);
  });

  it("shrinks toward a lowered bound one message per append", () => {
    const ctx = new ConversationContext({ maxHistory: 10 });
    for (const value of ["m1", "m2", "m3", "m4"]) {
      ctx.append("user", value);
    }
    ctx.setMaxHistory(2);
    expect(ctx.getHistoryCount()).toBe(4);

    ctx.append("assistant", "m5");
    expect(contents(ctx)).toEqual(["m2", "m3", "m4", "m5"]);

    ctx.append("user", "m6");
    expect(contents(ctx)).toEqual(["m3", "m4", "m5", "m6"]);
  });

  it("rejects a negative bound", () => {
    expect(() => new ConversationContext({ maxHistory: -1 })).toThrow("maxHistory must be a non-negative number: -1");
  });
});

describe("ConversationContext read views", () => {
  function seeded(): ConversationContext {
    const ctx = new ConversationContext({ systemPrompt: "S" });
    ctx.append("user", "u1");
    ctx.append("assistant", "a1");
    ctx.append("user", "u2");
    return ctx;
  }

  it("returns only the system message for a window of one or less", () => {
    const ctx = seeded();
    expect(ctx.getContext(1)).toEqual([text("system", "S")]);
    expect(ctx.getContext(0)).toEqual([text("system", "S")]);
  });

  it("keeps the system message in front of the newest tail", () => {
    const ctx = seeded();
    expect(ctx.getContext(3)).toEqual([text("system", "S"), text("assistant", "a1"), text("user", "u2")]);
  });

  it("does not repeat the system message when the window exceeds the history", () => {
    const ctx = seeded();
    expect(ctx.getContext(10)).toEqual(ctx.getMessages());
    expect(ctx.getContext(10)).toHaveLength(4);
  });

  it("returns the last messages when no system prompt is pinned", () => {
    const ctx = new ConversationContext();
    ctx.append("user", "m1");
    ctx.append("assistant", "m2");
    ctx.append("user", "m3");

    expect(ctx.getContext(2)).toEqual([text("assistant", "m2"), text("user", "m3")]);
    expect(ctx.getContext(0)).toEqual([]);
  });

  it("hands out copies that do not reach internal state", () => {
    const ctx = new ConversationContext({ systemPrompt: "S" });
    ctx.append("user", [{ type: "text", text: "look" }]);

    const copy = ctx.getContext();
    copy.pop();
    const first = copy[0];
    if (first) {
      first.content = "changed";
    }
    const parts = ctx.getMessages()[1]?.content;
    if (Array.isArray(parts)) {
      parts.push({ type: "image", url: "shot.png" });
    }

    expect(ctx.getMessages()).toEqual([text("system", "S"), { role: "user", content: [{ type: "text", text: "look" }] }]);
  });

  it("filters by role in order", () => {
    const ctx = seeded();
    expect(ctx.getMessagesByRole("user")).toEqual([text("user", "u1"), text("user", "u2")]);
    expect(ctx.getAssistantMessages()).toEqual([text("assistant", "a1")]);
    expect(ctx.getUserMessages()).toHaveLength(2);
    expect(ctx.getHistoryCount()).toBe(3);
  });

  it("clears down to the system message or to nothing", () => {
    const ctx = seeded();
    ctx.clear();
    expect(ctx.getMessages()).toEqual([text("system", "S")]);
    expect(ctx.getHistoryCount()).toBe(0);

    ctx.clear(false);
    expect(ctx.getMessages()).toEqual([]);
    expect(ctx.getSystemPrompt()).toBeUndefined();
  });

  it("formats a readable transcript", () => {
    const ctx = new ConversationContext({ systemPrompt: "Be brief" });
    ctx.append("user", [
      { type: "text", text: "look" },
      { type: "image", url: "shot.png" },
    ]);
    ctx.append("assistant", "ok");
    ctx.append("user", [{ type: "image", url: "other.png" }]);
    ctx.append("user", []);

    expect(ctx.formatTranscript()).toBe(
      "[SYSTEM] Be brief\n\n[USER] look\n\n[ASSISTANT] ok\n\n[USER] [image]\n\n[USER] [multimodal message]",
    );
  });

  it("describes itself with a shortened system prompt", () => {
    const ctx = new ConversationContext({ systemPrompt: "You are a helpful test assistant" });
    ctx.append("user", "hi");
    expect(ctx.toString()).toBe("ConversationContext(systemPrompt='You are a helpful test assista...', history=1 messages)");
    expect(new ConversationContext().toString()).toBe("ConversationContext(systemPrompt='None...', history=0 messages)");
  });
});

describe("ConversationContext.recordTurn", () => {
  it("appends the user message and the synchronous reply", async () => {
    const transport = new FakeTransport({ reply: "hi there" });
    const ctx = new ConversationContext({ systemPrompt: "S", transport });

    await expect(ctx.recordTurn("hello")).resolves.toBe("hi there");

    expect(ctx.getMessages()).toEqual([text("system", "S"), text("user", "hello"), text("assistant", "hi there")]);
    expect(transport.requests[0]?.messages).toEqual([text("system", "S"), text("user", "hello")]);
  });

  it("passes request options and the abort signal to the transport", async () => {
    const transport = new FakeTransport({ reply: "ok" });
    const ctx = new ConversationContext({ transport, requestOptions: { temperature: 0.1, debugTag: "chat:test" } });
    const controller = new AbortController();

    await ctx.recordTurn("hello", { signal: controller.signal });

    expect(transport.requests[0]?.temperature).toBe(0.1);
    expect(transport.requests[0]?.debugTag).toBe("chat:test");
    expect(transport.requests[0]?.signal).toBe(controller.signal);
  });

  it("streams fragments to the observer and commits the joined text once", async () => {
    const onFragment = vi.fn();
    const transport = new FakeTransport({ fragments: ["Hel", "lo"] });
    const ctx = new ConversationContext({ systemPrompt: "S", transport, onFragment });

    await expect(ctx.recordTurn("greet me", { stream: true })).resolves.toBe("Hello");

    expect(onFragment.mock.calls).toEqual([["Hel"], ["lo"]]);
    expect(ctx.getAssistantMessages()).toEqual([text("assistant", "Hello")]);
    expect(ctx.getHistoryCount()).toBe(2);
  });

  it("commits a streamed reply silently after the user append trimmed the oldest turn", async () => {
    const ctx = new ConversationContext({ systemPrompt: "S", maxHistory: 2 });
    ctx.append("user", "u1");
    ctx.append("assistant", "a1");

    await ctx.recordTurn("u2", { stream: true, transport: new FakeTransport({ fragments: ["a2"] }) });

    expect(contents(ctx)).toEqual(["S", "u2", "a2"]);
  });

  it("records nothing for an empty stream", async () => {
    const ctx = new ConversationContext({ systemPrompt: "S", transport: new FakeTransport({ fragments: [] }) });

    await expect(ctx.recordTurn("hello", { stream: true })).resolves.toBe("");
    expect(ctx.getMessages()).toEqual([text("system", "S"), text("user", "hello")]);
  });

  it("rolls back the user message when the transport fails", async () => {
    const ctx = new ConversationContext({
      systemPrompt: "S",
      transport: new FakeTransport({ error: new Error("boom") }),
    });
    ctx.append("user", "u1");
    ctx.append("assistant", "a1");
    const before = ctx.getMessages();

    const failure = ctx.recordTurn("u2");
    await expect(failure).rejects.toBeInstanceOf(TransportFailureError);
    await expect(failure).rejects.toThrow("boom");
    expect(ctx.getMessages()).toEqual(before);
  });

  it("restores the turn trimmed by the failed user append", async () => {
    const ctx = new ConversationContext({
      systemPrompt: "S",
      maxHistory: 2,
      transport: new FakeTransport({ error: new Error("network down") }),
    });
    ctx.append("user", "u1");
    ctx.append("assistant", "a1");

    await expect(ctx.recordTurn("u2")).rejects.toThrow("network down");
    expect(contents(ctx)).toEqual(["S", "u1", "a1"]);
  });

  it("re-signals transport errors that are already classified", async () => {
    const error = new TransportFailureError("LLM request failed (500): upstream", { statusCode: 500 });
    const ctx = new ConversationContext({ transport: new FakeTransport({ error }) });

    await expect(ctx.recordTurn("hello")).rejects.toBe(error);
    expect(ctx.getMessages()).toEqual([]);
  });

  it("discards partial stream text when the stream fails midway", async () => {
    const onFragment = vi.fn();
    const ctx = new ConversationContext({
      transport: new FakeTransport({ fragments: ["par"], error: new Error("stream reset") }),
      onFragment,
    });

    await expect(ctx.recordTurn("hello", { stream: true })).rejects.toThrow("stream reset");
    expect(onFragment.mock.calls).toEqual([["par"]]);
    expect(ctx.getMessages()).toEqual([]);
  });

  it("discards the buffer and rolls back when the turn is cancelled", async () => {
    const controller = new AbortController();
    const onFragment = vi.fn();
    const ctx = new ConversationContext({
      systemPrompt: "S",
      onFragment,
      transport: new FakeTransport({
        fragments: ["Hel", "lo"],
        beforeToken: (index) => {
          if (index === 1) {
            controller.abort();
          }
        },
      }),
    });

    await expect(ctx.recordTurn("hello", { stream: true, signal: controller.signal })).rejects.toBeInstanceOf(
      TurnCancelledError,
    );
    expect(onFragment.mock.calls).toEqual([["Hel"]]);
    expect(ctx.getMessages()).toEqual([text("system", "S")]);
    expect(ctx.isTurnInFlight()).toBe(false);
  });

  it("swaps collaborators at run time", async () => {
    const ctx = new ConversationContext();
    const first = vi.fn();
    const second = vi.fn();
    ctx.setOnFragment(first);
    ctx.setTransport(new FakeTransport({ fragments: ["one"] }));
    await ctx.recordTurn("a", { stream: true });

    ctx.setOnFragment(second);
    ctx.setTransport(new FakeTransport({ fragments: ["two"] }));
    await ctx.recordTurn("b", { stream: true });

    expect(first.mock.calls).toEqual([["one"]]);
    expect(second.mock.calls).toEqual([["two"]]);
    expect(contents(ctx)).toEqual(["a", "one", "b", "two"]);

    ctx.setTransport(undefined);
    await expect(ctx.recordTurn("c")).rejects.toBeInstanceOf(TransportUnavailableError);
  });

  it("fails without touching the history when no transport is configured", async () => {
    const ctx = new ConversationContext({ systemPrompt: "S" });

    await expect(ctx.recordTurn("hello")).rejects.toBeInstanceOf(TransportUnavailableError);
    expect(ctx.getMessages()).toEqual([text("system", "S")]);
  });

  it("rejects a second turn while one is in flight", async () => {
    const pending: { release?: (response: ChatCompletionResponse) => void } = {};
    const transport: ChatCompletionApi = {
      complete: () =>
        new Promise<ChatCompletionResponse>((resolve) => {
          pending.release = resolve;
        }),
      stream: async () => ({ content: "", raw: {} }),
    };
    const ctx = new ConversationContext({ transport });

    const first = ctx.recordTurn("one");
    await expect(ctx.recordTurn("two")).rejects.toBeInstanceOf(TurnInProgressError);
    pending.release?.({ content: "done", raw: {} });

    await expect(first).resolves.toBe("done");
    expect(ctx.getMessages()).toEqual([text("user", "one"), text("assistant", "done")]);
  });
});
