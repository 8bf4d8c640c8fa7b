import { randomUUID } from 'node:crypto';
import type { ApiCallRecord } from '@searchgate/shared/src/types/api-call.types.js';
import type { ApiCallRepository, RecordApiCallInput } from './api-call.repository.js';

export const DEFAULT_MAX_API_CALL_RECORDS = 200;

export function createInMemoryApiCallRepository(
  maxEntries: number = DEFAULT_MAX_API_CALL_RECORDS,
): ApiCallRepository {
  const records: ApiCallRecord[] = [];

  return {
    record(input: RecordApiCallInput): Promise<ApiCallRecord> {
      const record: ApiCallRecord = {
        id: randomUUID(),
        ...input,
        recordedAt: new Date(),
      };
      records.push(record);
      if (records.length > maxEntries) {
        records.splice(0, records.length - maxEntries);
      }
      return Promise.resolve(record);
    },

    list(limit?: number): Promise<readonly ApiCallRecord[]> {
      const newestFirst = [...records].reverse();
      return Promise.resolve(limit !== undefined ? newestFirst.slice(0, limit) : newestFirst);
    },
  };
}
