import blessed from "blessed";
import type { ChatMessage, ChatRole, MessageContent } from "../types/chat.js";

/**
 * 파일 목적:
 * - chat TUI 로그 버퍼(라인 목록 + 스트리밍 블록)를 순수 함수로 다룬다.
 * - 화면 객체 없이도 테스트할 수 있도록 blessed 태그 문자열만 만든다.
 *
 * 역의존성:
 * - src/cli/chat-tui.ts
 */
export interface ChatLogState {
  lines: string[];
  /** 스트리밍 중인 assistant 블록의 시작 라인. 턴이 끝나면 undefined. */
  streamStart?: number;
  streamText: string;
}

export const MAX_LOG_LINES = 2400;
export const SPINNER_FRAMES = ["|", "/", "-", "\\"] as const;

const ROLE_STYLE: Record<ChatRole, { label: string; color: string }> = {
  system: { label: "system", color: "gray-fg" },
  user: { label: "you", color: "green-fg" },
  assistant: { label: "assistant", color: "cyan-fg" },
};

export function escapeTagText(text: string): string {
  return blessed.escape(text);
}

export function trimOneLine(text: string, maxLen = 220): string {
  const one = text.replace(/\s+/g, " ").trim();
  if (one.length <= maxLen) {
    return one || "<empty>";
  }
  return `${one.slice(0, maxLen)}...`;
}

export function createLogState(): ChatLogState {
  return { lines: [], streamStart: undefined, streamText: "" };
}

/**
 * 상한을 넘으면 위에서부터 버리고, 스트리밍 블록 인덱스도 같이 당긴다.
 */
export function pushLine(state: ChatLogState, line: string): number {
  if (state.lines.length >= MAX_LOG_LINES) {
    const removed = state.lines.length - MAX_LOG_LINES + 1;
    state.lines.splice(0, removed);
    if (state.streamStart !== undefined) {
      state.streamStart = Math.max(0, state.streamStart - removed);
    }
  }
  state.lines.push(line);
  return state.lines.length - 1;
}

export function contentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => {
      if (part.type === "text") {
        return part.text;
      }
      return part.url.startsWith("data:") ? "[image]" : `[image: ${trimOneLine(part.url, 60)}]`;
    })
    .join("\n");
}

function roleLines(role: ChatRole, text: string): string[] {
  const style = ROLE_STYLE[role];
  const [first = "", ...rest] = text.replace(/\r\n/g, "\n").split("\n");
  return [
    `{bold}{${style.color}}${style.label}>{/${style.color}}{/bold} ${escapeTagText(first)}`,
    ...rest.map((line) => `  ${escapeTagText(line)}`),
  ];
}

export function formatMessageLines(message: ChatMessage): string[] {
  const text = message.role === "system" ? trimOneLine(contentToText(message.content), 160) : contentToText(message.content);
  return roleLines(message.role, text);
}

export function appendMessage(state: ChatLogState, message: ChatMessage): void {
  for (const line of formatMessageLines(message)) {
    pushLine(state, line);
  }
}

export function appendNotice(state: ChatLogState, text: string, color = "yellow-fg"): void {
  pushLine(state, `{${color}}${escapeTagText(text)}{/}`);
}

export function startStream(state: ChatLogState): void {
  state.streamText = "";
  state.streamStart = pushLine(state, roleLines("assistant", "")[0] ?? "");
}

/**
 * 스트리밍 블록은 항상 로그의 마지막에 있으므로 시작 라인부터 끝까지 다시 그린다.
 */
export function appendStreamFragment(state: ChatLogState, fragment: string): void {
  if (state.streamStart === undefined) {
    startStream(state);
  }
  const start = state.streamStart ?? state.lines.length;
  state.streamText += fragment;
  state.lines.splice(start, state.lines.length - start, ...roleLines("assistant", state.streamText));
}

/**
 * 커밋되지 않은 스트림(실패/취소)은 화면에서도 걷어낸다.
 */
export function finishStream(state: ChatLogState, committed: boolean): void {
  if (state.streamStart !== undefined && !committed) {
    state.lines.splice(state.streamStart);
  }
  state.streamStart = undefined;
  state.streamText = "";
}

export function buildHeader(params: {
  profileId: string;
  model: string;
  historyCount: number;
  maxHistory: number;
  stream: boolean;
  busy: boolean;
  frame: number;
  pendingImages: number;
}): string {
  const status = params.busy ? `waiting ${SPINNER_FRAMES[params.frame % SPINNER_FRAMES.length]}` : "ready";
  return [
    ` profile=${escapeTagText(params.profileId)}`,
    `model=${escapeTagText(params.model)}`,
    `history=${params.historyCount}/${params.maxHistory}`,
    `stream=${params.stream ? "on" : "off"}`,
    ...(params.pendingImages > 0 ? [`images=${params.pendingImages}`] : []),
    status,
  ].join("  ");
}
