import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type { LocalResult } from '@searchgate/shared/src/types/search.types.js';
import type { ContentIndexRepository } from '../repositories/content-index.repository.js';
import { tokenize } from '../repositories/in-memory-content-index.repository.js';

const COLLECTION = 'index';
// Firestore caps array-contains-any at 30 values.
const MAX_QUERY_TERMS = 30;

interface IndexDocument {
  type: string;
  title: string;
  content?: string;
  keywords: string[];
  metadata: Record<string, unknown>;
  indexedAt?: Timestamp;
}

function fromDoc(id: string, data: IndexDocument): LocalResult {
  return {
    id,
    type: data.type,
    title: data.title,
    content: data.content,
    indexedAt: data.indexedAt?.toDate(),
    metadata: data.metadata,
  };
}

/**
 * Keyword lookup over the `index` collection. Matches on any query term and
 * orders by recency; there is no relevance scoring.
 */
export function createFirestoreContentIndexRepository(db: Firestore): ContentIndexRepository {
  const collectionRef = db.collection(COLLECTION);

  return {
    async search(query: string, limit: number): Promise<readonly LocalResult[]> {
      const terms = [...new Set(tokenize(query))].slice(0, MAX_QUERY_TERMS);
      if (terms.length === 0) {
        return [];
      }

      const snapshot = await collectionRef
        .where('keywords', 'array-contains-any', terms)
        .orderBy('indexedAt', 'desc')
        .limit(limit)
        .get();

      return snapshot.docs.map((doc) => fromDoc(doc.id, doc.data() as IndexDocument));
    },

    async upsert(entry: LocalResult): Promise<void> {
      const docData: IndexDocument = {
        type: entry.type,
        title: entry.title,
        content: entry.content,
        keywords: [...new Set([...tokenize(entry.title), ...tokenize(entry.content ?? '')])],
        metadata: { ...entry.metadata },
        indexedAt: entry.indexedAt ? Timestamp.fromDate(entry.indexedAt) : undefined,
      };
      await collectionRef.doc(entry.id).set(docData);
    },
  };
}
