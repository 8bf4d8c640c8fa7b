export type QuotaOperation = 'web_search';

export interface Account {
  readonly accountId: string;
  /** Credits, 1 credit = 1 penny. */
  readonly balance: number;
  readonly member: boolean;
  readonly admin: boolean;
}

export interface QuotaDecision {
  readonly allowed: boolean;
  readonly remaining: number;
  readonly cost: number;
  readonly reason?: string;
}
