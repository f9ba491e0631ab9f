/**
 * @tally/cli — Error types.
 */

/** Error codes for input handling. */
export type InputFileErrorCode = "NOT_FOUND" | "NOT_A_FILE" | "UNREADABLE";

/**
 * The transaction log could not be opened.
 */
export class InputFileError extends Error {
  public readonly code: InputFileErrorCode;
  public readonly path: string;

  constructor(code: InputFileErrorCode, path: string, cause?: unknown) {
    super(`${describe(code)}: ${path}`, { cause });
    this.name = "InputFileError";
    this.code = code;
    this.path = path;
  }
}

function describe(code: InputFileErrorCode): string {
  switch (code) {
    case "NOT_FOUND":
      return "Transaction file not found";
    case "NOT_A_FILE":
      return "Not a regular file";
    case "UNREADABLE":
      return "Transaction file is not readable";
  }
}
