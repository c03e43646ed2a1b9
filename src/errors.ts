export class SelectionHistoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SelectionHistoryError";
  }
}

export class EmptyHistoryError extends SelectionHistoryError {
  constructor() {
    super("No previous regions recorded");
    this.name = "EmptyHistoryError";
  }
}

export class SessionAlreadyActiveError extends SelectionHistoryError {
  constructor() {
    super("A region preview is already active");
    this.name = "SessionAlreadyActiveError";
  }
}

export class PreviewInactiveError extends SelectionHistoryError {
  constructor() {
    super("No region preview is active");
    this.name = "PreviewInactiveError";
  }
}

export class InvalidCursorError extends SelectionHistoryError {
  constructor(public readonly offset: number) {
    super(`No recorded region at offset ${offset}`);
    this.name = "InvalidCursorError";
  }
}

export class PreviewEndedError extends SelectionHistoryError {
  constructor() {
    super("This region preview has already ended");
    this.name = "PreviewEndedError";
  }
}
