import { resolve } from 'node:path';
import { loadIndexSeed } from '@searchgate/schemas/src/config-loader.js';
import { createFirestoreClient } from '@searchgate/core/src/infrastructure/firestore-client.js';
import { createFirestoreContentIndexRepository } from '@searchgate/core/src/infrastructure/firestore-content-index.repository.js';

async function main(): Promise<void> {
  const positionalArgs = process.argv.slice(2).filter((a) => !a.startsWith('--'));
  const seedFile = positionalArgs[0] ?? resolve(process.cwd(), 'data', 'sample-index.json');

  console.log('=== Searchgate Index Seeder ===\n');
  console.log(`Seed file: ${seedFile}`);
  console.log(`Firestore emulator: ${process.env['FIRESTORE_EMULATOR_HOST'] ?? 'not set (using real Firestore)'}\n`);

  const entries = await loadIndexSeed(seedFile);
  const repository = createFirestoreContentIndexRepository(createFirestoreClient());

  for (const entry of entries) {
    await repository.upsert(entry);
    console.log(`Indexed ${entry.type} "${entry.title}" (id: ${entry.id})`);
  }

  console.log(`\nSeeding complete: ${String(entries.length)} entries.`);
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
