import axios from 'axios';

/**
 * Concurrency Check
 *
 * Run against a live server (npm run dev) with an empty or disposable list.
 *
 * Scenario:
 * 1. Fire CONCURRENT_REQUESTS adds at once, half of them duplicates
 *    in different casing/whitespace
 * 2. Fire concurrent moves and deletes
 * 3. Verify no two names collide after normalization
 * 4. Verify order runs exactly 0..N-1
 */

const BASE_URL = process.env['API_BASE_URL'] || 'http://localhost:3000';
const CONCURRENT_REQUESTS = 100;
const UNIQUE_NAMES = CONCURRENT_REQUESTS / 2;

interface ListedItem {
  id: string;
  name: string;
  order: number;
}

const client = axios.create({
  baseURL: BASE_URL,
  timeout: 10000,
  validateStatus: () => true, // Don't throw on any status code
});

async function listItems(): Promise<ListedItem[]> {
  const response = await client.get<{ data: ListedItem[] }>('/v1/items');
  if (response.status !== 200) {
    throw new Error(`Failed to list items: ${response.status}`);
  }
  return response.data.data;
}

function checkInvariants(items: ListedItem[]): string[] {
  const problems: string[] = [];

  const names = new Set(items.map((item) => item.name.trim().toLowerCase()));
  if (names.size !== items.length) {
    problems.push(`duplicate names: ${items.length} items but ${names.size} distinct`);
  }

  const orders = items.map((item) => item.order).sort((a, b) => a - b);
  orders.forEach((order, index) => {
    if (order !== index) {
      problems.push(`order gap or tie at position ${index} (found ${order})`);
    }
  });

  return problems;
}

async function runConcurrencyCheck(): Promise<void> {
  const tag = Date.now().toString(36);
  const before = (await listItems()).length;

  console.log(`🚀 Sending ${CONCURRENT_REQUESTS} concurrent adds (${UNIQUE_NAMES} unique)`);

  const adds = await Promise.all(
    Array.from({ length: CONCURRENT_REQUESTS }, (_, index) => {
      const base = `check-${tag}-${index % UNIQUE_NAMES}`;
      const name = index < UNIQUE_NAMES ? base : `  ${base.toUpperCase()} `;
      return client.post('/v1/items', { name, insert_at_top: index % 2 === 0 });
    })
  );

  const added = adds.filter((response) => response.status === 201).length;
  const skipped = adds.filter((response) => response.status === 200).length;
  console.log(`   Added: ${added}, skipped: ${skipped}`);

  if (added !== UNIQUE_NAMES) {
    console.error(`❌ Expected exactly ${UNIQUE_NAMES} adds to succeed, got ${added}`);
    process.exit(1);
  }

  const afterAdds = await listItems();
  console.log(`🔀 Sending concurrent moves and deletes over ${afterAdds.length} items`);

  const victims = afterAdds.slice(0, 5).map((item) => item.id);
  await Promise.all([
    ...Array.from({ length: 20 }, (_, index) =>
      client.post('/v1/items/move', { from_index: index, to_index: afterAdds.length - 1 - index })
    ),
    client.post('/v1/items/delete', { ids: victims }),
  ]);

  const final = await listItems();
  const problems = checkInvariants(final);

  console.log('\n📊 Final list state:');
  console.log(`   Items before: ${before}`);
  console.log(`   Items after:  ${final.length}`);

  if (problems.length > 0) {
    problems.forEach((problem) => console.error(`❌ ${problem}`));
    process.exit(1);
  }

  console.log('✓ Names unique and order dense after concurrent requests');
}

runConcurrencyCheck().catch((error: unknown) => {
  console.error('Concurrency check failed:', error);
  process.exit(1);
});
