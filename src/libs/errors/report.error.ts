export enum ExitCode {
  Success = 0,
  Failure = 1,
  Configuration = 2,
  Fetch = 3,
  Delivery = 4,
}

export abstract class ReportError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Required configuration is missing or invalid. Raised before any network call.
 */
export class ConfigurationError extends ReportError {
  readonly exitCode = ExitCode.Configuration;

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
  }
}

export interface FetchErrorDetails {
  status?: number;
  cause?: unknown;
}

/**
 * A news or market section could not be fetched or its response was malformed.
 */
export class FetchError extends ReportError {
  readonly exitCode = ExitCode.Fetch;
  readonly status?: number;

  constructor(readonly section: string, message: string, details: FetchErrorDetails = {}) {
    super(`Failed to fetch ${section}: ${message}`, { cause: details.cause });
    this.status = details.status;
  }
}

/**
 * SMTP authentication or transport failed. Nothing was delivered.
 */
export class DeliveryError extends ReportError {
  readonly exitCode = ExitCode.Delivery;
  readonly code?: string;

  constructor(message: string, details: { code?: string; cause?: unknown } = {}) {
    super(`Failed to deliver report: ${message}`, { cause: details.cause });
    this.code = details.code;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorCode = (error: unknown): string | number | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
};
