/**
 * Errors raised by the merge engine.
 */

export type SourceSyntax = "json" | "yaml";

/**
 * A parameter source could not be read as a mapping document.
 *
 * `sourceIndex` is the position in the list the caller passed in, before any
 * precedence sort.
 */
export class FormatError extends Error {
  constructor(
    message: string,
    public syntax: SourceSyntax,
    public sourceIndex?: number,
    public scopeName?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FormatError";
  }

  /**
   * Copy of this error attributed to a source position.
   */
  withSource(sourceIndex: number, scopeName?: string): FormatError {
    const label = scopeName ? `${scopeName} (source ${sourceIndex})` : `source ${sourceIndex}`;
    return new FormatError(
      `${label}: ${this.message}`,
      this.syntax,
      sourceIndex,
      scopeName,
      { cause: this.cause },
    );
  }
}
