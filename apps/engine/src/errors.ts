export class MalformedRequestError extends Error {
  constructor(message = "Malformed decision request") {
    super(message);
    this.name = "MalformedRequestError";
  }
}

export class AuditWriteError extends Error {
  constructor(message = "Audit entry could not be written", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuditWriteError";
  }
}

export class ExecutionRefusedError extends Error {
  constructor(message = "Execution refused") {
    super(message);
    this.name = "ExecutionRefusedError";
  }
}
