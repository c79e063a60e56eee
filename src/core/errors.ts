export type SerpFailureKind = 'transport' | 'status' | 'malformed';

export class SerpRequestError extends Error {
  constructor(
    message: string,
    readonly kind: SerpFailureKind,
    readonly status?: number,
    readonly body?: string,
  ) {
    super(message);
    this.name = 'SerpRequestError';
  }
}

export type HarvestFailureKind = SerpFailureKind | 'cancelled';

export class HarvestError extends Error {
  constructor(
    message: string,
    readonly kind: HarvestFailureKind,
    readonly run: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'HarvestError';
  }
}

export class ProfileLoginError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ProfileLoginError';
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class EnrichmentCancelledError extends Error {
  constructor(readonly resolved: number, readonly remaining: number) {
    super(`enrichment cancelled with ${remaining} lookups remaining`);
    this.name = 'EnrichmentCancelledError';
  }
}
