/**
 * Migration-specific Error Types
 */

export type MigrationErrorCode =
  | 'EMPTY_FIELD_GROUP'
  | 'MAPPINGS_NOT_LOADED';

export interface MigrationErrorDetails {
  code: MigrationErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class MigrationError extends Error {
  readonly code: MigrationErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: MigrationErrorDetails) {
    super(details.message);
    this.name = 'MigrationError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
