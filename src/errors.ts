export type FailureKind =
  | 'InvalidInput'
  | 'UpstreamUnavailable'
  | 'UpstreamMalformed'
  | 'StoreFailure'
  | 'PredictionUnavailable';

export type UpstreamService = 'nationalize' | 'countries';

interface FailureOptions {
  cause?: unknown;
}

export class NationalityError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options: FailureOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class InvalidInputError extends NationalityError {
  constructor(message: string) {
    super('InvalidInput', message);
  }
}

export class UpstreamUnavailableError extends NationalityError {
  constructor(
    readonly service: UpstreamService,
    message: string,
    readonly status: number | null = null,
    options: FailureOptions = {}
  ) {
    super('UpstreamUnavailable', message, options);
  }
}

export class UpstreamMalformedError extends NationalityError {
  constructor(readonly service: UpstreamService, message: string, options: FailureOptions = {}) {
    super('UpstreamMalformed', message, options);
  }
}

export class StoreFailureError extends NationalityError {
  constructor(message: string, options: FailureOptions = {}) {
    super('StoreFailure', message, options);
  }
}

export class PredictionUnavailableError extends NationalityError {
  constructor(readonly normalizedName: string, message: string, options: FailureOptions = {}) {
    super('PredictionUnavailable', message, options);
  }
}

export function isNationalityError(error: unknown): error is NationalityError {
  return error instanceof NationalityError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const EXIT_CODES: Record<FailureKind, number> = {
  InvalidInput: 2,
  UpstreamUnavailable: 3,
  UpstreamMalformed: 3,
  PredictionUnavailable: 3,
  StoreFailure: 4
};

export function exitCodeFor(error: unknown): number {
  return isNationalityError(error) ? EXIT_CODES[error.kind] : 1;
}
