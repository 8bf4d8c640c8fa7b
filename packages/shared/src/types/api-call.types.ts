export interface ApiCallRecord {
  readonly id: string;
  readonly provider: string;
  readonly method: string;
  readonly url: string;
  /** 0 when the call never reached the network. */
  readonly status: number;
  readonly durationMs: number;
  readonly error?: string;
  readonly requestBody?: string;
  readonly responseBody?: string;
  readonly recordedAt: Date;
}
