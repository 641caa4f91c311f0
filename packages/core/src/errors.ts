/**
 * Error taxonomy
 *
 * ValidationError and NotFoundError propagate to callers.
 * ProviderUnavailableError and SchedulerJobError are absorbed inside the engine
 * and only ever show up as fallback/absent markers on the data.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly entity: string,
    readonly id: string
  ) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export class ProviderUnavailableError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    cause?: unknown
  ) {
    super(`${provider} unavailable: ${message}`, { cause });
    this.name = 'ProviderUnavailableError';
  }
}

export class SchedulerJobError extends Error {
  constructor(
    readonly jobName: string,
    cause: unknown
  ) {
    super(`Job ${jobName} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'SchedulerJobError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
