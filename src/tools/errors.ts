/**
 * Base error for tool failures. Carries the name of the tool that raised it.
 */
export class ToolError extends Error {
  constructor(
    message: string,
    public readonly toolName: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Raised when tool input fails validation.
 */
export class ValidationError extends ToolError {}
