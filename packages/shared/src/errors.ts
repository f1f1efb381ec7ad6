import { ZodError, ZodIssue } from 'zod';

export class ShipyardError extends Error {
  constructor(
    message: string,
    public readonly exitCode = 1
  ) {
    super(message);
    this.name = 'ShipyardError';
  }
}

export class UsageError extends ShipyardError {
  constructor(message: string) {
    super(message, 2);
    this.name = 'UsageError';
  }
}

export class ValidationError extends ShipyardError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  static fromZod(subject: string, error: ZodError) {
    const details = error.issues
      .map((issue) => `${issue.path.length ? issue.path.join('.') : subject}: ${issue.message}`)
      .join('; ');
    return new ValidationError(`Invalid ${subject}: ${details}`, error.issues);
  }
}

export class ScaffoldConflictError extends ShipyardError {
  constructor(public readonly paths: string[]) {
    super(`Refusing to overwrite existing files (use --force): ${paths.join(', ')}`);
    this.name = 'ScaffoldConflictError';
  }
}

export class CommandFailedError extends ShipyardError {
  constructor(
    public readonly stepId: string,
    public readonly commandLine: string,
    public readonly toolExitCode: number,
    public readonly stderr: string
  ) {
    const tail = stderr.trim().split('\n').slice(-5).join('\n');
    super(
      `Step "${stepId}" failed with exit code ${toolExitCode}: ${commandLine}${tail ? `\n${tail}` : ''}`
    );
    this.name = 'CommandFailedError';
  }
}
