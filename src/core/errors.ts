/**
 * 대화/전송 계층의 오류 계층.
 * CLI는 `code`로 분기하지 않고 `message`만 출력하지만, 테스트와 호출자는 클래스로 구분한다.
 */
export class ChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ChatError";
  }
}

export class TransportUnavailableError extends ChatError {
  constructor() {
    super("no chat transport configured", "TRANSPORT_UNAVAILABLE");
    this.name = "TransportUnavailableError";
  }
}

export class TransportFailureError extends ChatError {
  constructor(
    message: string,
    options?: { cause?: unknown; statusCode?: number },
  ) {
    super(message, "TRANSPORT_FAILURE", options);
    this.name = "TransportFailureError";
    this.statusCode = options?.statusCode;
  }

  readonly statusCode: number | undefined;
}

export class TurnCancelledError extends ChatError {
  constructor(options?: { cause?: unknown }) {
    super("turn cancelled before the reply completed", "TURN_CANCELLED", options);
    this.name = "TurnCancelledError";
  }
}

export class TurnInProgressError extends ChatError {
  constructor() {
    super("another turn is still in flight", "TURN_IN_PROGRESS");
    this.name = "TurnInProgressError";
  }
}

/** 첨부 이미지 파일을 읽지 못함. 첨부 시점에 나며 히스토리는 건드리지 않는다. */
export class AttachmentError extends ChatError {
  constructor(
    message: string,
    public readonly reference: string,
    options?: { cause?: unknown },
  ) {
    super(message, "ATTACHMENT_UNREADABLE", options);
    this.name = "AttachmentError";
  }
}

export class ConfigError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
