import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { loadConfig } from "../config/env.js";
import { errorMessage } from "../core/errors.js";
import { openChatSession, runTurn } from "../runtime/chat-service.js";
import { writeSessionLog } from "../runtime/session-log.js";
import { PendingAttachments } from "../runtime/user-content.js";

function parseArgs(argv: string[]): { profileId?: string; stream?: boolean } {
  const profileIdx = argv.indexOf("--profile");
  const profileId = profileIdx >= 0 && argv[profileIdx + 1] ? argv[profileIdx + 1] : undefined;
  const stream = argv.includes("--no-stream") ? false : argv.includes("--stream") ? true : undefined;
  return { profileId, stream };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  if (args.profileId) {
    config.chatProfileId = args.profileId;
  }

  let streamedAny = false;
  const session = await openChatSession(config, {
    stream: args.stream,
    onFragment: (fragment) => {
      if (!streamedAny) {
        output.write("assistant> ");
        streamedAny = true;
      }
      output.write(fragment);
    },
  });
  const { context } = session;
  const attachments = new PendingAttachments();

  const rl = readline.createInterface({ input, output });

  output.write(`profile: ${session.profile.id} model: ${session.profile.model.model} stream: ${session.stream}\n`);
  output.write("commands: /exit, /reset, /show, /transcript, /system <text>, /image <path|url>, /stream on|off, /history\n\n");

  while (true) {
    const line = (await rl.question("you> ")).trim();

    if (!line) {
      continue;
    }

    if (line === "/exit") {
      break;
    }

    if (line === "/reset") {
      context.clear(true);
      attachments.clear();
      output.write("conversation reset complete\n");
      continue;
    }

    if (line === "/show") {
      output.write(JSON.stringify(context.getMessages(), null, 2) + "\n");
      continue;
    }

    if (line === "/transcript") {
      output.write(context.formatTranscript() + "\n");
      continue;
    }

    if (line === "/history") {
      output.write(`${context.toString()} state=${context.describeState()} maxHistory=${context.getMaxHistory()}\n`);
      continue;
    }

    if (line.startsWith("/system ")) {
      const value = line.slice(8).trim();
      if (value) {
        context.setSystemPrompt(value);
        output.write("system prompt updated\n");
      }
      continue;
    }

    if (line.startsWith("/image ")) {
      const value = line.slice(7).trim();
      if (value) {
        try {
          const pending = await attachments.attach(value);
          output.write(`attached image (${pending} pending): ${value}\n`);
        } catch (error) {
          output.write(`error> ${errorMessage(error)}\n`);
        }
      }
      continue;
    }

    if (line.startsWith("/stream ")) {
      const value = line.slice(8).trim();
      if (value === "on" || value === "off") {
        session.stream = value === "on";
        output.write(`stream set to ${session.stream}\n`);
      } else {
        output.write("invalid stream value (on|off)\n");
      }
      continue;
    }

    try {
      streamedAny = false;
      const answer = await attachments.sendWith(line, (userContent) => runTurn(session, userContent));
      if (session.stream) {
        output.write(streamedAny ? "\n\n" : "assistant> <empty>\n\n");
      } else {
        output.write(`assistant> ${answer}\n\n`);
      }
    } catch (error) {
      const kept = attachments.count > 0 ? ` (${attachments.count} image(s) still attached)` : "";
      output.write(`${streamedAny ? "\n" : ""}error> ${errorMessage(error)}${kept}\n\n`);
    }
  }

  rl.close();
  const logFile = await writeSessionLog(config.chatLogDir, context);
  if (logFile) {
    output.write(`session log: ${logFile}\n`);
  }
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
