export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, detail?: string) {
    super(detail ? `unknown session: ${sessionId} (${detail})` : `unknown session: ${sessionId}`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
