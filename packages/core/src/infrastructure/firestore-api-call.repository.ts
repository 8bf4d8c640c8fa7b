import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type { ApiCallRecord } from '@searchgate/shared/src/types/api-call.types.js';
import type { ApiCallRepository, RecordApiCallInput } from '../repositories/api-call.repository.js';

const COLLECTION = 'api-calls';
const DEFAULT_LIST_LIMIT = 200;

interface ApiCallDocument {
  provider: string;
  method: string;
  url: string;
  status: number;
  durationMs: number;
  error?: string;
  requestBody?: string;
  responseBody?: string;
  recordedAt: Timestamp;
}

function fromDoc(id: string, data: ApiCallDocument): ApiCallRecord {
  return {
    id,
    provider: data.provider,
    method: data.method,
    url: data.url,
    status: data.status,
    durationMs: data.durationMs,
    error: data.error,
    requestBody: data.requestBody,
    responseBody: data.responseBody,
    recordedAt: data.recordedAt.toDate(),
  };
}

export function createFirestoreApiCallRepository(db: Firestore): ApiCallRepository {
  const collectionRef = db.collection(COLLECTION);

  return {
    async record(input: RecordApiCallInput): Promise<ApiCallRecord> {
      const docData: ApiCallDocument = {
        ...input,
        recordedAt: Timestamp.now(),
      };
      const docRef = await collectionRef.add(docData);
      return fromDoc(docRef.id, docData);
    },

    async list(limit: number = DEFAULT_LIST_LIMIT): Promise<readonly ApiCallRecord[]> {
      const snapshot = await collectionRef.orderBy('recordedAt', 'desc').limit(limit).get();
      return snapshot.docs.map((doc) => fromDoc(doc.id, doc.data() as ApiCallDocument));
    },
  };
}
