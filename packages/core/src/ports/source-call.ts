export interface SourceCallOptions {
  /** Aborted when the caller stops waiting for the result. */
  signal?: AbortSignal | undefined;
}
