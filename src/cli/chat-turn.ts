import { loadConfig } from "../config/env.js";
import { errorMessage } from "../core/errors.js";
import { openChatSession, runTurn } from "../runtime/chat-service.js";
import { PendingAttachments } from "../runtime/user-content.js";

function parseArgs(argv: string[]): { profileId?: string; message: string; images: string[]; stream?: boolean } {
  const profileIdx = argv.indexOf("--profile");
  const msgIdx = argv.indexOf("--message");

  const profileId = profileIdx >= 0 && argv[profileIdx + 1] ? argv[profileIdx + 1] : undefined;
  const message = msgIdx >= 0 && argv[msgIdx + 1] ? argv[msgIdx + 1] : "";
  const images = argv.flatMap((arg, i) => (arg === "--image" && argv[i + 1] ? [argv[i + 1]] : []));
  const stream = argv.includes("--no-stream") ? false : undefined;

  if (!message.trim() && images.length === 0) {
    throw new Error("--message or --image is required");
  }

  return { profileId, message, images, stream };
}

async function main(): Promise<void> {
  const { profileId, message, images, stream } = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  if (profileId) {
    config.chatProfileId = profileId;
  }

  const session = await openChatSession(config, {
    stream,
    onFragment: (fragment) => process.stdout.write(fragment),
  });
  const attachments = new PendingAttachments();
  for (const image of images) {
    await attachments.attach(image);
  }
  const answer = await attachments.sendWith(message, (userContent) => runTurn(session, userContent));

  process.stdout.write(session.stream ? "\n" : answer + "\n");
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
