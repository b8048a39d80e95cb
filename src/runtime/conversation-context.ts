import type { ChatCompletionApi, CompletionRequest } from "../core/api/chat-completion.js";
import {
  ChatError,
  TransportFailureError,
  TransportUnavailableError,
  TurnCancelledError,
  TurnInProgressError,
  errorMessage,
} from "../core/errors.js";
import type { ChatMessage, ChatRole, MessageContent } from "../types/chat.js";

/**
 * 파일 목적:
 * - 멀티턴 대화 히스토리(system -> user -> assistant ...)를 소유하고 관리한다.
 * - 고정 system 메시지, 턴 단위 sliding window, 동기/스트림 응답 반영을 담당한다.
 *
 * 주요 의존성:
 * - core/api/chat-completion: 응답을 만들어 주는 전송 계층
 * - core/errors: 턴 실패 분류
 *
 * 역의존성:
 * - runtime/chat-service.ts, runtime/prompt-presets.ts, runtime/session-log.ts, src/cli/*
 *
 * 불변식:
 * 1) system 메시지는 최대 1개이며, 있으면 항상 index 0에 있다.
 * 2) non-silent append 는 trim 을 최대 한 번 수행한다. silent append 이후에는 상한을 잠시 넘을 수 있다.
 * 3) system 고정 상태의 trim은 가장 오래된 턴(두 메시지)을 한 번에 제거한다.
 */
export const DEFAULT_MAX_HISTORY = 50;

/** system 메시지는 setSystemPrompt 로만 들어온다. */
export type TurnRole = Exclude<ChatRole, "system">;

export type FragmentObserver = (fragment: string) => void;

/** 매 턴 요청에 그대로 실리는 샘플링/디버그 옵션. */
export type TurnRequestOptions = Omit<CompletionRequest, "messages" | "signal">;

export enum ContextState {
  Empty = "empty",
  SystemOnly = "system-only",
  History = "history",
}

export interface ConversationContextOptions {
  systemPrompt?: string;
  transport?: ChatCompletionApi;
  maxHistory?: number;
  onFragment?: FragmentObserver;
  requestOptions?: TurnRequestOptions;
}

export interface TurnOptions {
  stream?: boolean;
  signal?: AbortSignal;
  transport?: ChatCompletionApi;
}

function cloneContent(content: MessageContent): MessageContent {
  return typeof content === "string" ? content : content.map((part) => ({ ...part }));
}

function cloneMessage(message: ChatMessage): ChatMessage {
  return { role: message.role, content: cloneContent(message.content) };
}

function normalizeMaxHistory(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`maxHistory must be a non-negative number: ${value}`);
  }
  return Math.floor(value);
}

function summarizeContent(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  const first = content[0];
  if (!first) {
    return "[multimodal message]";
  }
  return first.type === "text" ? first.text : "[image]";
}

function roleLabel(role: ChatRole): string {
  switch (role) {
    case "system":
      return "[SYSTEM]";
    case "user":
      return "[USER]";
    case "assistant":
      return "[ASSISTANT]";
    default: {
      const unreachable: never = role;
      return unreachable;
    }
  }
}

function toTurnError(error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) {
    return error instanceof TurnCancelledError ? error : new TurnCancelledError({ cause: error });
  }
  if (error instanceof ChatError) {
    return error;
  }
  return new TransportFailureError(errorMessage(error), { cause: error });
}

export class ConversationContext {
  private messages: ChatMessage[] = [];
  private maxHistory: number;
  private transport: ChatCompletionApi | undefined;
  private onFragment: FragmentObserver | undefined;
  private readonly requestOptions: TurnRequestOptions;
  private turnInFlight = false;

  constructor(options: ConversationContextOptions = {}) {
    this.maxHistory = normalizeMaxHistory(options.maxHistory ?? DEFAULT_MAX_HISTORY);
    this.transport = options.transport;
    this.onFragment = options.onFragment;
    this.requestOptions = { ...options.requestOptions };

    if (options.systemPrompt) {
      this.setSystemPrompt(options.systemPrompt);
    }
  }

  setSystemPrompt(prompt: string): void {
    const pinned = this.pinnedSystem();
    if (pinned) {
      pinned.content = prompt;
      return;
    }
    this.messages.unshift({ role: "system", content: prompt });
  }

  getSystemPrompt(): string | undefined {
    const pinned = this.pinnedSystem();
    if (!pinned) {
      return undefined;
    }
    return typeof pinned.content === "string" ? pinned.content : summarizeContent(pinned.content);
  }

  /**
   * 메시지를 끝에 추가한다.
   * silent 가 아니면 trim 을 한 번 수행한다. 스트림 커밋처럼 직전 user append 에서
   * 이미 턴 단위 trim 이 끝난 경우 silent 로 호출한다.
   */
  append(role: TurnRole, content: MessageContent, silent = false): void {
    this.pushMessage({ role, content: cloneContent(content) }, silent);
  }

  getMessages(): ChatMessage[] {
    return this.messages.map(cloneMessage);
  }

  /**
   * 전송용 컨텍스트 뷰. limit 이 작아도 고정 system 메시지는 빠지지 않는다.
   */
  getContext(limit?: number): ChatMessage[] {
    if (limit === undefined) {
      return this.getMessages();
    }

    const window = Math.floor(limit);
    const pinned = this.pinnedSystem();
    if (pinned) {
      if (window <= 1) {
        return [cloneMessage(pinned)];
      }
      const rest = this.messages.slice(1);
      return [pinned, ...rest.slice(-(window - 1))].map(cloneMessage);
    }

    if (window <= 0) {
      return [];
    }
    return this.messages.slice(-window).map(cloneMessage);
  }

  clear(keepSystem = true): void {
    const pinned = this.pinnedSystem();
    this.messages = keepSystem && pinned ? [pinned] : [];
  }

  getHistoryCount(): number {
    const count = this.pinnedSystem() ? this.messages.length - 1 : this.messages.length;
    return Math.max(0, count);
  }

  getMessagesByRole<R extends ChatRole>(role: R): Array<ChatMessage & { role: R }> {
    return this.messages
      .filter((message): message is ChatMessage & { role: R } => message.role === role)
      .map((message) => ({ role: message.role, content: cloneContent(message.content) }));
  }

  getUserMessages(): ChatMessage[] {
    return this.getMessagesByRole("user");
  }

  getAssistantMessages(): ChatMessage[] {
    return this.getMessagesByRole("assistant");
  }

  describeState(): ContextState {
    if (this.messages.length === 0) {
      return ContextState.Empty;
    }
    if (this.pinnedSystem() && this.messages.length === 1) {
      return ContextState.SystemOnly;
    }
    return ContextState.History;
  }

  getMaxHistory(): number {
    return this.maxHistory;
  }

  /** 새 상한은 다음 non-silent append 부터 적용된다. */
  setMaxHistory(maxHistory: number): void {
    this.maxHistory = normalizeMaxHistory(maxHistory);
  }

  setTransport(transport: ChatCompletionApi | undefined): void {
    this.transport = transport;
  }

  setOnFragment(observer: FragmentObserver | undefined): void {
    this.onFragment = observer;
  }

  isTurnInFlight(): boolean {
    return this.turnInFlight;
  }

  /**
   * user 메시지 하나와 그 응답을 기록한다.
   * 1) user 메시지를 낙관적으로 append
   * 2) 전체 컨텍스트로 전송 계층 호출
   * 3) 성공 시 assistant 응답 커밋, 실패/취소 시 user append 와 그로 인한 trim 을 되돌린다
   */
  async recordTurn(userContent: MessageContent, options: TurnOptions = {}): Promise<string> {
    const transport = options.transport ?? this.transport;
    if (!transport) {
      throw new TransportUnavailableError();
    }
    if (this.turnInFlight) {
      throw new TurnInProgressError();
    }

    this.turnInFlight = true;
    const userMessage: ChatMessage = { role: "user", content: cloneContent(userContent) };
    const trimmed = this.pushMessage(userMessage, false);

    try {
      return options.stream
        ? await this.streamReply(transport, options.signal)
        : await this.completeReply(transport, options.signal);
    } catch (error) {
      this.rollbackUserMessage(userMessage, trimmed);
      throw toTurnError(error, options.signal);
    } finally {
      this.turnInFlight = false;
    }
  }

  formatTranscript(): string {
    return this.messages
      .map((message) => `${roleLabel(message.role)} ${summarizeContent(message.content)}`)
      .join("\n\n");
  }

  toString(): string {
    const systemPrompt = this.getSystemPrompt() ?? "None";
    return `ConversationContext(systemPrompt='${systemPrompt.slice(0, 30)}...', history=${this.getHistoryCount()} messages)`;
  }

  private async completeReply(transport: ChatCompletionApi, signal?: AbortSignal): Promise<string> {
    const response = await transport.complete({
      ...this.requestOptions,
      messages: this.getMessages(),
      signal,
    });
    if (signal?.aborted) {
      throw new TurnCancelledError();
    }

    this.pushMessage({ role: "assistant", content: response.content }, false);
    return response.content;
  }

  /**
   * 스트림 조각은 턴이 소유한 버퍼에만 쌓고, 종료 신호 이후에 한 번만 커밋한다.
   * 취소되면 버퍼는 버려진다.
   */
  private async streamReply(transport: ChatCompletionApi, signal?: AbortSignal): Promise<string> {
    const buffer: string[] = [];

    await transport.stream(
      {
        ...this.requestOptions,
        messages: this.getMessages(),
        signal,
      },
      {
        onToken: (token) => {
          if (signal?.aborted) {
            return;
          }
          buffer.push(token);
          this.onFragment?.(token);
        },
      },
    );
    if (signal?.aborted) {
      throw new TurnCancelledError();
    }

    const text = buffer.join("");
    if (text) {
      this.pushMessage({ role: "assistant", content: text }, true);
    }
    return text;
  }

  private pinnedSystem(): ChatMessage | undefined {
    const first = this.messages[0];
    return first?.role === "system" ? first : undefined;
  }

  /**
   * 추가 후 trim 으로 제거된 메시지를 오래된 순서대로 돌려준다.
   */
  private pushMessage(message: ChatMessage, silent: boolean): ChatMessage[] {
    this.messages.push(message);
    if (silent) {
      return [];
    }
    return this.trimOverflow();
  }

  /**
   * append 당 최대 한 번, 단위 하나(system 고정 시 가장 오래된 턴, 아니면 메시지 하나)만 제거한다.
   * silent append 나 상한 축소로 더 넘친 길이는 이후 non-silent append 마다 한 단위씩 줄어든다.
   * system 고정 상태에서 non-system 메시지가 하나뿐이면 제거하지 않는다.
   */
  private trimOverflow(): ChatMessage[] {
    if (this.messages.length <= this.maxHistory + 1) {
      return [];
    }
    if (!this.pinnedSystem()) {
      return this.messages.splice(0, 1);
    }
    if (this.messages.length <= 2) {
      return [];
    }
    return this.removeOldestTurn();
  }

  /** 고정 system 바로 뒤의 가장 오래된 user/assistant 쌍. */
  private removeOldestTurn(): ChatMessage[] {
    return this.messages.splice(1, 2);
  }

  private rollbackUserMessage(userMessage: ChatMessage, trimmed: ChatMessage[]): void {
    const index = this.messages.lastIndexOf(userMessage);
    if (index >= 0) {
      this.messages.splice(index, 1);
    }
    const restored = trimmed.filter((message) => message !== userMessage);
    if (restored.length > 0) {
      const insertAt = this.pinnedSystem() ? 1 : 0;
      this.messages.splice(insertAt, 0, ...restored);
    }
  }
}
