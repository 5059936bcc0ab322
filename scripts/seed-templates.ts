/**
 * Seed the template store with the bundled starter templates.
 * Usage: npm run seed
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { getServices } from '../lib/services';
import { seedTemplates } from '../lib/seedTemplates';

const SEED_PATH = resolve(process.cwd(), 'data', 'default-templates.json');

async function main() {
  const raw: unknown = JSON.parse(readFileSync(SEED_PATH, 'utf-8'));
  const { templates } = getServices();
  const created = await seedTemplates(templates, raw);
  console.log(`Seeded ${created.length} templates`);
}

main().catch((error) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
