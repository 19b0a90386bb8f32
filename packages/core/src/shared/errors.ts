export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class SourceNotFoundError extends Error {
  constructor(
    public readonly source: string,
    public readonly cause?: unknown,
  ) {
    super(`Source not found: ${source}`);
    this.name = 'SourceNotFoundError';
  }
}

export class MalformedSourceError extends Error {
  constructor(
    public readonly source: string,
    reason: string,
    public readonly cause?: unknown,
  ) {
    super(`Malformed source ${source}: ${reason}`);
    this.name = 'MalformedSourceError';
  }
}

/**
 * A rule that parsed but is structurally unusable. `ruleId` is the rule's own
 * id when it has a usable one, otherwise `#<index>` of its position in the source.
 */
export class InvalidRuleError extends Error {
  constructor(
    public readonly source: string,
    public readonly ruleId: string,
    public readonly field: string,
    reason: string,
  ) {
    super(`Invalid rule ${ruleId} in ${source}: ${field} ${reason}`);
    this.name = 'InvalidRuleError';
  }
}

export type SourceLoadError = SourceNotFoundError | MalformedSourceError | InvalidRuleError;

export function isSourceLoadError(error: unknown): error is SourceLoadError {
  return (
    error instanceof SourceNotFoundError ||
    error instanceof MalformedSourceError ||
    error instanceof InvalidRuleError
  );
}
