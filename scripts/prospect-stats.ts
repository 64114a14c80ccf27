import 'dotenv/config';
import { loadConfig, requireConfig } from '../src/config.js';
import { buildStore } from '../src/services.js';
import { errorMessage } from '../src/lib/errors.js';

async function showStats() {
  const settings = loadConfig();
  requireConfig(settings, ['supabaseUrl', 'supabaseKey']);
  const store = buildStore(settings);

  const [total, byStatus] = await Promise.all([store.countProspects(), store.countByStatus()]);

  console.log(`📊 Prospects in ${settings.prospectsTable}: ${total}\n`);
  const statuses = Object.entries(byStatus).sort(([, a], [, b]) => b - a);
  for (const [status, count] of statuses) {
    console.log(`   ${status.padEnd(16)} ${String(count).padStart(6)}`);
  }
}

showStats().catch((error) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exit(1);
});
