import { imageFileToDataUrl, isInlineOrRemoteImage } from "../adapter/api/image-encoding.js";
import type { ContentPart, MessageContent } from "../types/chat.js";

export const DEFAULT_IMAGE_INSTRUCTION = "Please analyze this image.";

/**
 * `/image`, `--image` 로 받은 참조를 히스토리에 넣을 형태로 바꾼다.
 * 로컬 파일은 이 시점에 한 번만 읽어 data URL 로 고정하고, data/http(s) URL 은 그대로 둔다.
 */
export async function resolveImageAttachment(ref: string): Promise<string> {
  const trimmed = ref.trim();
  if (!trimmed) {
    throw new Error("image reference is empty");
  }
  return isInlineOrRemoteImage(trimmed) ? trimmed : imageFileToDataUrl(trimmed);
}

/**
 * 입력 텍스트와 첨부 이미지 참조로 user 메시지 content 를 만든다.
 * 이미지가 없으면 평문, 있으면 text part 하나 뒤에 image part 들이 온다.
 */
export function buildUserContent(text: string, images: readonly string[] = []): MessageContent {
  const trimmed = text.trim();
  const refs = images.map((ref) => ref.trim()).filter((ref) => ref.length > 0);

  if (refs.length === 0) {
    if (!trimmed) {
      throw new Error("message text or an image attachment is required");
    }
    return trimmed;
  }

  const parts: ContentPart[] = [{ type: "text", text: trimmed || DEFAULT_IMAGE_INSTRUCTION }];
  for (const url of refs) {
    parts.push({ type: "image", url });
  }
  return parts;
}

/**
 * 다음 메시지에 붙일 첨부 목록.
 * 턴이 성공했을 때만 비워지므로 실패/취소된 턴 뒤에도 첨부가 남아 재전송할 수 있다.
 */
export class PendingAttachments {
  private readonly refs: string[] = [];

  get count(): number {
    return this.refs.length;
  }

  /** 참조를 data URL 등으로 고정해 쌓고, 쌓인 개수를 돌려준다. */
  async attach(ref: string): Promise<number> {
    this.refs.push(await resolveImageAttachment(ref));
    return this.refs.length;
  }

  clear(): void {
    this.refs.length = 0;
  }

  async sendWith<T>(text: string, send: (content: MessageContent) => Promise<T>): Promise<T> {
    const result = await send(buildUserContent(text, this.refs));
    this.clear();
    return result;
  }
}
