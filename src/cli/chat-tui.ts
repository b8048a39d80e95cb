import blessed from "blessed";
import { loadConfig, type AppConfig } from "../config/env.js";
import { TurnCancelledError, errorMessage } from "../core/errors.js";
import { openChatSession, runTurn, type ChatSession } from "../runtime/chat-service.js";
import { writeSessionLog } from "../runtime/session-log.js";
import { PendingAttachments } from "../runtime/user-content.js";
import {
  SPINNER_FRAMES,
  appendMessage,
  appendNotice,
  appendStreamFragment,
  buildHeader,
  createLogState,
  finishStream,
  pushLine,
  startStream,
  type ChatLogState,
} from "./chat-tui-view.js";

/**
 * 파일 목적:
 * - 대화 세션을 전체 화면 TUI 로 띄운다.
 * - 스트림 조각은 마지막 assistant 블록을 갱신하고, 턴이 끝날 때까지 입력을 막는다.
 *
 * 주요 의존성:
 * - runtime/chat-service: 세션 조립 및 턴 실행
 * - runtime/session-log: 종료 시 로그 덤프
 * - blessed: 화면 분할/입력/스크롤 렌더링
 *
 * 역의존성:
 * - package.json `npm run chat:tui`
 */
interface UiParts {
  screen: blessed.Widgets.Screen;
  header: blessed.Widgets.BoxElement;
  logBox: blessed.Widgets.BoxElement;
  inputPane: blessed.Widgets.BoxElement;
  promptLabel: blessed.Widgets.TextElement;
  inputBox: blessed.Widgets.TextboxElement;
}

const RENDER_THROTTLE_MS = 33;
const SPINNER_INTERVAL_MS = 120;

class ChatTuiApp {
  private readonly ui: UiParts;
  private readonly log: ChatLogState = createLogState();
  private readonly attachments = new PendingAttachments();

  private renderTimer: NodeJS.Timeout | undefined;
  private spinnerTimer: NodeJS.Timeout | undefined;
  private spinnerFrame = 0;
  private turnAbort: AbortController | undefined;
  private activeTurn: Promise<void> | undefined;
  private doneResolver: (() => void) | undefined;
  private closing = false;

  constructor(
    private readonly config: AppConfig,
    private readonly session: ChatSession,
  ) {
    this.session.context.setOnFragment((fragment) => {
      appendStreamFragment(this.log, fragment);
      this.requestRender(false);
    });
    this.ui = this.createUi();
    this.bindUiEvents();
    this.showWelcome();
    this.ui.inputBox.focus();
    this.requestRender(true);
  }

  /**
   * `/exit` 또는 `Ctrl+C` 후 로그 기록까지 끝나면 resolve 된다.
   */
  run(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.doneResolver = resolve;
    });
  }

  private createUi(): UiParts {
    const screen = blessed.screen({
      smartCSR: true,
      fullUnicode: true,
      title: "Prism Chat",
      dockBorders: true,
    });

    const header = blessed.box({
      parent: screen,
      top: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
      style: { fg: "white", bg: "blue" },
    });

    const logBox = blessed.box({
      parent: screen,
      top: 1,
      left: 0,
      width: "100%",
      bottom: 3,
      tags: true,
      scrollable: true,
      alwaysScroll: true,
      mouse: true,
      keys: true,
      vi: true,
      scrollbar: {
        ch: " ",
        track: { bg: "black" },
        style: { bg: "white" },
      },
      style: { fg: "white", bg: "black" },
    });

    const inputPane = blessed.box({
      parent: screen,
      bottom: 0,
      left: 0,
      width: "100%",
      height: 3,
      style: { bg: "gray" },
    });

    const promptLabel = blessed.text({
      parent: inputPane,
      top: 1,
      left: 2,
      content: "you>",
      style: { fg: "white", bg: "gray", bold: true },
    });

    const inputBox = blessed.textbox({
      parent: inputPane,
      inputOnFocus: true,
      keys: true,
      mouse: true,
      top: 1,
      left: 8,
      right: 2,
      height: 1,
      style: { fg: "white", bg: "gray" },
    });

    return { screen, header, logBox, inputPane, promptLabel, inputBox };
  }

  private bindUiEvents(): void {
    this.ui.screen.key(["C-c"], () => {
      void this.shutdown();
    });

    this.ui.screen.on("resize", () => {
      this.requestRender(true);
    });

    this.ui.inputBox.key("enter", () => {
      this.ui.inputBox.submit();
    });

    this.ui.inputBox.on("submit", (value) => {
      const raw = typeof value === "string" ? value : this.ui.inputBox.getValue();
      this.ui.inputBox.clearValue();
      this.ui.inputBox.focus();
      void this.handleSubmittedLine(raw);
    });
  }

  private showWelcome(): void {
    for (const message of this.session.context.getMessages()) {
      appendMessage(this.log, message);
    }
    appendNotice(
      this.log,
      "commands: /exit, /reset, /system <text>, /image <path|url>, /stream on|off, /transcript",
      "gray-fg",
    );
    pushLine(this.log, "");
  }

  /**
   * 입력 라인 처리 중심점. 턴이 진행 중이면 어떤 입력도 받지 않는다.
   */
  private async handleSubmittedLine(raw: string): Promise<void> {
    const line = raw.trim();
    if (!line) {
      this.requestRender(true);
      return;
    }

    if (this.turnAbort) {
      appendNotice(this.log, "reply in progress: wait for it to finish or press Ctrl+C to quit.");
      this.requestRender(true);
      return;
    }

    if (line === "/exit") {
      await this.shutdown();
      return;
    }

    if (line === "/reset") {
      this.session.context.clear(true);
      this.attachments.clear();
      this.log.lines.length = 0;
      this.showWelcome();
      appendNotice(this.log, "conversation reset", "cyan-fg");
      this.requestRender(true);
      return;
    }

    if (line === "/transcript") {
      for (const transcriptLine of this.session.context.formatTranscript().split("\n")) {
        appendNotice(this.log, transcriptLine, "gray-fg");
      }
      this.requestRender(true);
      return;
    }

    if (line.startsWith("/system ")) {
      const value = line.slice(8).trim();
      if (value) {
        this.session.context.setSystemPrompt(value);
        appendNotice(this.log, "system prompt updated", "cyan-fg");
      }
      this.requestRender(true);
      return;
    }

    if (line.startsWith("/image ")) {
      const value = line.slice(7).trim();
      if (value) {
        try {
          await this.attachments.attach(value);
          appendNotice(this.log, `image attached: ${value}`, "cyan-fg");
        } catch (error) {
          appendNotice(this.log, `error: ${errorMessage(error)}`, "red-fg");
        }
      }
      this.requestRender(true);
      return;
    }

    if (line.startsWith("/stream ")) {
      const value = line.slice(8).trim();
      if (value === "on" || value === "off") {
        this.session.stream = value === "on";
        appendNotice(this.log, `stream set to ${value}`, "cyan-fg");
      } else {
        appendNotice(this.log, "invalid stream value (on|off)", "red-fg");
      }
      this.requestRender(true);
      return;
    }

    this.activeTurn = this.sendMessage(line);
    await this.activeTurn;
    this.activeTurn = undefined;
  }

  private async sendMessage(text: string): Promise<void> {
    const abort = new AbortController();

    try {
      const answer = await this.attachments.sendWith(text, (userContent) => {
        appendMessage(this.log, { role: "user", content: userContent });
        this.turnAbort = abort;
        this.startSpinner();
        if (this.session.stream) {
          startStream(this.log);
        }
        this.requestRender(true);
        return runTurn(this.session, userContent, abort.signal);
      });
      if (this.session.stream) {
        finishStream(this.log, answer.length > 0);
        if (!answer) {
          appendNotice(this.log, "(empty reply)", "gray-fg");
        }
      } else {
        appendMessage(this.log, { role: "assistant", content: answer });
      }
    } catch (error) {
      finishStream(this.log, false);
      if (!(error instanceof TurnCancelledError)) {
        const kept = this.attachments.count > 0 ? ` (${this.attachments.count} image(s) still attached)` : "";
        appendNotice(this.log, `error: ${errorMessage(error)}${kept}`, "red-fg");
      }
    } finally {
      this.turnAbort = undefined;
      this.stopSpinner();
      pushLine(this.log, "");
      if (!this.closing) {
        this.requestRender(true);
      }
    }
  }

  private startSpinner(): void {
    this.stopSpinner();
    this.spinnerFrame = 0;
    this.spinnerTimer = setInterval(() => {
      this.spinnerFrame = (this.spinnerFrame + 1) % SPINNER_FRAMES.length;
      this.requestRender(false);
    }, SPINNER_INTERVAL_MS);
  }

  private stopSpinner(): void {
    if (this.spinnerTimer) {
      clearInterval(this.spinnerTimer);
      this.spinnerTimer = undefined;
    }
  }

  /**
   * 토큰 고속 스트리밍 시에도 33ms 단위로만 실제 렌더를 수행한다.
   */
  private requestRender(immediate: boolean): void {
    if (this.closing) {
      return;
    }
    if (immediate) {
      if (this.renderTimer) {
        clearTimeout(this.renderTimer);
        this.renderTimer = undefined;
      }
      this.render();
      return;
    }

    if (this.renderTimer) {
      return;
    }

    this.renderTimer = setTimeout(() => {
      this.renderTimer = undefined;
      this.render();
    }, RENDER_THROTTLE_MS);
  }

  private render(): void {
    const { context, profile } = this.session;
    this.ui.header.setContent(
      buildHeader({
        profileId: profile.id,
        model: profile.model.model,
        historyCount: context.getHistoryCount(),
        maxHistory: context.getMaxHistory(),
        stream: this.session.stream,
        busy: this.turnAbort !== undefined,
        frame: this.spinnerFrame,
        pendingImages: this.attachments.count,
      }),
    );
    this.ui.logBox.setContent(this.log.lines.join("\n"));
    this.ui.logBox.setScrollPerc(100);
    this.ui.screen.render();
  }

  /**
   * 진행 중인 턴은 abort 되어 부분 응답과 user 메시지가 롤백된 뒤에 로그로 남긴다.
   */
  private async shutdown(): Promise<void> {
    if (this.closing) {
      return;
    }
    this.closing = true;
    this.turnAbort?.abort();
    this.stopSpinner();

    if (this.renderTimer) {
      clearTimeout(this.renderTimer);
      this.renderTimer = undefined;
    }

    this.ui.screen.destroy();
    await this.activeTurn;
    const logFile = await writeSessionLog(this.config.chatLogDir, this.session.context);
    if (logFile) {
      process.stdout.write(`session log: ${logFile}\n`);
    }
    this.doneResolver?.();
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const session = await openChatSession(config);
  const app = new ChatTuiApp(config, session);
  await app.run();
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
