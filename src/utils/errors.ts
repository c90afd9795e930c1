/**
 * Error types surfaced to the operator by the digest runner.
 * Each carries the exit code the CLI should terminate with.
 */

export class DigestError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid environment configuration. Raised before any fetch. */
export class ConfigError extends DigestError {}

/** The feed could not be read. No digest is rendered or sent. */
export class FetchError extends DigestError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** An export target (e.g. the OPML file) could not be produced. */
export class RenderError extends DigestError {}

/** SMTP handoff failed. */
export class DeliveryError extends DigestError {}

/** Bad command-line flags. */
export class UsageError extends DigestError {
  override readonly exitCode: number = 2;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
