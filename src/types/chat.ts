export type ChatRole = "system" | "user" | "assistant";

export interface TextPart {
  type: "text";
  text: string;
}

/**
 * 이미지 참조. `data:` URL, `http(s)` URL, 또는 로컬 파일 경로를 담는다.
 * 전송 직전 인코딩은 adapter 책임이다.
 */
export interface ImagePart {
  type: "image";
  url: string;
}

export type ContentPart = TextPart | ImagePart;

export type MessageContent = string | ContentPart[];

export interface ChatMessage {
  role: ChatRole;
  content: MessageContent;
}

export interface ChatCompletionResponse {
  content: string;
  raw: unknown;
}

export interface SessionLog {
  exportedAt: string;
  count: number;
  messages: ChatMessage[];
}
