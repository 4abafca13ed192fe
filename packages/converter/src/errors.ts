export type RunAbortCode = "INPUT_UNREADABLE" | "OUTPUT_UNWRITABLE" | "OUTPUT_INSIDE_INPUT";

/** Raised only for problems that make the whole run impossible. */
export class RunAbortedError extends Error {
  public readonly code: RunAbortCode;

  public constructor(code: RunAbortCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RunAbortedError";
    this.code = code;
  }
}
