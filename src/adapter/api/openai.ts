import type {
  ChatCompletionAdapter,
  ChatCompletionApi,
  CompletionRequest,
  StreamHandler,
} from "../../core/api/chat-completion.js";
import { TransportFailureError, errorMessage } from "../../core/errors.js";
import type { ChatCompletionResponse } from "../../types/chat.js";
import type { ResolvedModelCandidate } from "../../types/model.js";
import { previewWireContent, toWireMessages, type WireMessage } from "./image-encoding.js";

interface OpenAICompatibleChoice {
  message?: {
    role?: string;
    content?: string | null;
  };
}

interface OpenAICompatibleResponse {
  choices?: OpenAICompatibleChoice[];
}

interface OpenAIStreamDelta {
  content?: string | null;
}

interface OpenAIStreamChoice {
  delta?: OpenAIStreamDelta;
  message?: {
    content?: string | null;
  };
}

interface OpenAIStreamChunk {
  choices?: OpenAIStreamChoice[];
}

const DEFAULT_TEMPERATURE = 0.7;

const DEBUG_LLM_REQUESTS = (() => {
  const raw = process.env.DEBUG_LLM_REQUESTS?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
})();

function toEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/$/, "")}/chat/completions`;
}

function toRequestBody(
  candidate: ResolvedModelCandidate,
  request: CompletionRequest,
  messages: WireMessage[],
  stream: boolean,
): Record<string, unknown> {
  const maxTokens = request.maxTokens ?? candidate.maxTokens;
  return {
    model: candidate.model,
    messages,
    ...(stream ? { stream: true } : {}),
    temperature: request.temperature ?? candidate.temperature ?? DEFAULT_TEMPERATURE,
    ...(maxTokens ? { max_tokens: maxTokens } : {}),
    ...(request.topP !== undefined ? { top_p: request.topP } : {}),
    ...(candidate.extraBody ?? {}),
    ...(request.extraBody ?? {}),
  };
}

function toOneLine(value: string, maxLen = 220): string {
  const compact = value.replace(/\s+/g, " ").trim();
  if (compact.length <= maxLen) {
    return compact;
  }
  return `${compact.slice(0, maxLen)}...`;
}

function debugLogRequest(params: {
  candidate: ResolvedModelCandidate;
  request: CompletionRequest;
  messages: WireMessage[];
  stream: boolean;
}): void {
  const enabled = params.request.debugEnabled === true || DEBUG_LLM_REQUESTS;
  if (!enabled) {
    return;
  }

  const roleSeq = params.messages.map((m) => m.role).join(">");
  const preview = params.messages
    .slice(-3)
    .map((m, i) => `${i}:${m.role}:${toOneLine(previewWireContent(m.content), 80)}`)
    .join(" | ");
  const imageCount = params.messages.reduce(
    (sum, m) => sum + (typeof m.content === "string" ? 0 : m.content.filter((p) => p.type === "image_url").length),
    0,
  );

  process.stderr.write(
    [
      "[llm-debug]",
      `tag=${params.request.debugTag ?? "unknown"}`,
      `provider=${params.candidate.provider}`,
      `model=${params.candidate.model}`,
      `stream=${params.stream}`,
      `messages=${params.messages.length}`,
      `images=${imageCount}`,
      `roleSeq=${roleSeq}`,
      `tail=${preview}`,
    ].join(" ") + "\n",
  );
}

function extractChunkToken(chunk: OpenAIStreamChunk): string {
  const choice = chunk.choices?.[0];
  return choice?.delta?.content ?? choice?.message?.content ?? "";
}

/** JSON 이 아닌 keepalive 라인은 undefined. */
function parseStreamChunk(payload: string): OpenAIStreamChunk | undefined {
  try {
    return JSON.parse(payload) as OpenAIStreamChunk;
  } catch {
    return undefined;
  }
}

async function readSSEStream(response: Response, handlers?: StreamHandler): Promise<string> {
  if (!response.body) {
    throw new TransportFailureError("stream response body is unavailable");
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let done = false;
  let finished = false;
  let pending = "";
  let fullText = "";

  /** `[DONE]` 을 만나면 true. */
  const consumeLine = (rawLine: string): boolean => {
    const line = rawLine.trim();
    if (!line.startsWith("data:")) {
      return false;
    }
    const payload = line.slice(5).trim();
    if (payload === "[DONE]") {
      return true;
    }
    const parsed = parseStreamChunk(payload);
    const token = parsed ? extractChunkToken(parsed) : "";
    if (token) {
      fullText += token;
      handlers?.onToken?.(token);
    }
    return false;
  };

  try {
    while (!done && !finished) {
      const result = await reader.read();
      done = result.done;
      pending += decoder.decode(result.value ?? new Uint8Array(), { stream: !done });

      let idx = pending.indexOf("\n");
      while (idx >= 0 && !finished) {
        finished = consumeLine(pending.slice(0, idx));
        pending = pending.slice(idx + 1);
        idx = pending.indexOf("\n");
      }
    }

    if (!finished && pending.trim()) {
      consumeLine(pending);
    }
  } finally {
    // [DONE] 이후의 잔여 본문이나 읽기/토큰 처리 실패 시에도 연결을 놓아준다.
    if (!done) {
      await reader.cancel().catch((cancelError: unknown) => {
        process.stderr.write(`[llm-debug] stream cancel failed: ${errorMessage(cancelError)}\n`);
      });
    }
  }

  return fullText;
}

class OpenAIChatCompletionApi implements ChatCompletionApi {
  constructor(private readonly candidate: ResolvedModelCandidate) {}

  async complete(request: CompletionRequest): Promise<ChatCompletionResponse> {
    const response = await this.post(request, false);

    if (!response.ok) {
      const errorBody = await response.text();
      throw new TransportFailureError(`LLM request failed (${response.status}): ${errorBody}`, {
        statusCode: response.status,
      });
    }

    const data = (await response.json()) as OpenAICompatibleResponse;
    const content = data.choices?.[0]?.message?.content?.trim();

    if (!content) {
      throw new TransportFailureError("LLM response did not contain assistant content");
    }

    return { content, raw: data };
  }

  async stream(request: CompletionRequest, handlers?: StreamHandler): Promise<ChatCompletionResponse> {
    const response = await this.post(request, true);

    if (!response.ok) {
      const errorBody = await response.text();
      throw new TransportFailureError(`LLM stream request failed (${response.status}): ${errorBody}`, {
        statusCode: response.status,
      });
    }

    const content = await readSSEStream(response, handlers);
    return { content, raw: { streamed: true } };
  }

  private async post(request: CompletionRequest, stream: boolean): Promise<Response> {
    const messages = await toWireMessages(request.messages);
    const body = toRequestBody(this.candidate, request, messages, stream);
    debugLogRequest({ candidate: this.candidate, request, messages, stream });

    try {
      return await fetch(toEndpoint(this.candidate.baseUrl), {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.candidate.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: request.signal,
      });
    } catch (error) {
      throw new TransportFailureError(`LLM request failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export class OpenAICompatibleAdapter implements ChatCompletionAdapter {
  readonly provider = "openai-compatible" as const;

  create(candidate: ResolvedModelCandidate): ChatCompletionApi {
    return new OpenAIChatCompletionApi(candidate);
  }
}

export class OpenAIAdapter implements ChatCompletionAdapter {
  readonly provider = "openai" as const;

  create(candidate: ResolvedModelCandidate): ChatCompletionApi {
    return new OpenAIChatCompletionApi(candidate);
  }
}
