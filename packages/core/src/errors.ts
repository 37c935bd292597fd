export type SourceErrorKind =
  | 'network'
  | 'auth'
  | 'timeout'
  | 'rate_limit'
  | 'invalid_response'
  | 'upstream';

/**
 * Failure of one external source (news, search or completion). Always
 * recovered by the handler layer.
 */
export class SourceError extends Error {
  public readonly source: string;
  public readonly kind: SourceErrorKind;
  public readonly status: number | undefined;

  public constructor(input: { source: string; kind: SourceErrorKind; message: string; status?: number; cause?: unknown }) {
    super(`${input.source}: ${input.message}`, { cause: input.cause });
    this.name = 'SourceError';
    this.source = input.source;
    this.kind = input.kind;
    this.status = input.status;
  }

  public get retryable(): boolean {
    return this.kind === 'network' || this.kind === 'timeout' || this.kind === 'rate_limit' || this.kind === 'upstream';
  }
}

/** Maps an HTTP status from an upstream API onto a `SourceErrorKind`. */
export function sourceErrorKindForStatus(status: number): SourceErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'upstream';
  return 'invalid_response';
}

export class PersistenceError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends Error {
  public readonly missing: string[];
  public readonly invalid: string[];

  public constructor(input: { missing?: string[]; invalid?: string[] }) {
    const missing = input.missing ?? [];
    const invalid = input.invalid ?? [];
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing ${missing.join(', ')}`);
    if (invalid.length > 0) parts.push(`invalid ${invalid.join(', ')}`);
    super(`Invalid assistant config: ${parts.join('; ')}`);
    this.name = 'ConfigError';
    this.missing = missing;
    this.invalid = invalid;
  }
}
