import { readFile } from "node:fs/promises";
import path from "node:path";
import { AttachmentError, errorMessage } from "../../core/errors.js";
import type { ChatMessage, ContentPart } from "../../types/chat.js";

/**
 * 파일 목적:
 * - 내부 메시지 모델을 OpenAI chat.completions 요청 형식으로 변환한다.
 * - 로컬 이미지 경로 -> base64 data URL 변환을 제공한다. CLI 는 첨부 시점에 변환해 두므로
 *   히스토리에는 data URL 이 남고, 여기서 경로를 만나는 경우는 라이브러리 호출자가 경로를 그대로 넘긴 때뿐이다.
 *
 * 역의존성:
 * - adapter/api/openai.ts
 */
export type WireContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface WireMessage {
  role: ChatMessage["role"];
  content: string | WireContentPart[];
}

const MIME_BY_EXTENSION: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

export function guessImageMimeType(filePath: string): string {
  return MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? "image/jpeg";
}

export function isInlineOrRemoteImage(url: string): boolean {
  return url.startsWith("data:image") || /^https?:\/\//i.test(url);
}

export async function imageFileToDataUrl(filePath: string): Promise<string> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    throw new AttachmentError(`image conversion failed (${filePath}): ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }
  return `data:${guessImageMimeType(filePath)};base64,${data.toString("base64")}`;
}

async function toWirePart(part: ContentPart): Promise<WireContentPart> {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  const url = isInlineOrRemoteImage(part.url) ? part.url : await imageFileToDataUrl(part.url);
  return { type: "image_url", image_url: { url } };
}

export async function toWireMessages(messages: ChatMessage[]): Promise<WireMessage[]> {
  return Promise.all(
    messages.map(async (message) => {
      if (typeof message.content === "string") {
        return { role: message.role, content: message.content };
      }
      const content = await Promise.all(message.content.map(toWirePart));
      return { role: message.role, content };
    }),
  );
}

/**
 * 디버그 로그용 한 줄 미리보기. data URL 본문은 출력하지 않는다.
 */
export function previewWireContent(content: WireMessage["content"]): string {
  if (typeof content === "string") {
    return content;
  }
  return content.map((part) => (part.type === "text" ? part.text : "[image]")).join(" ");
}
