import type { ApiCallRecord } from '@searchgate/shared/src/types/api-call.types.js';

export interface RecordApiCallInput {
  readonly provider: string;
  readonly method: string;
  readonly url: string;
  readonly status: number;
  readonly durationMs: number;
  readonly error?: string;
  readonly requestBody?: string;
  readonly responseBody?: string;
}

/**
 * Append-only log of outbound calls to third-party APIs.
 */
export interface ApiCallRepository {
  record(input: RecordApiCallInput): Promise<ApiCallRecord>;
  /** Newest first. */
  list(limit?: number): Promise<readonly ApiCallRecord[]>;
}
