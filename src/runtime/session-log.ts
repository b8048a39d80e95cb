import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../core/errors.js";
import type { SessionLog } from "../types/chat.js";
import type { ConversationContext } from "./conversation-context.js";

function logFileName(exportedAt: string): string {
  return `chat-${exportedAt.replace(/[:.]/g, "-")}.json`;
}

export function buildSessionLog(context: ConversationContext, now: Date = new Date()): SessionLog {
  const messages = context.getMessages();
  return {
    exportedAt: now.toISOString(),
    count: messages.length,
    messages,
  };
}

/**
 * 세션 종료 시 히스토리를 JSON 으로 한 번 덤프한다.
 * 실패해도 호출자를 막지 않는다: stderr 에 남기고 undefined 를 돌려준다.
 */
export async function writeSessionLog(
  logDir: string,
  context: ConversationContext,
  now: Date = new Date(),
): Promise<string | undefined> {
  const log = buildSessionLog(context, now);
  const file = path.join(logDir, logFileName(log.exportedAt));

  try {
    await mkdir(logDir, { recursive: true });
    await writeFile(file, JSON.stringify(log, null, 2), "utf-8");
    return file;
  } catch (error) {
    process.stderr.write(`[session-log] failed to write ${file}: ${errorMessage(error)}\n`);
    return undefined;
  }
}
