import { Firestore } from '@google-cloud/firestore';

export function createFirestoreClient(projectId?: string): Firestore {
  return new Firestore({
    projectId: projectId ?? process.env['SEARCHGATE_GCP_PROJECT_ID'],
    ignoreUndefinedProperties: true,
  });
}
