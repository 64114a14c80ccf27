import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { serve } from '@hono/node-server';
import { loadConfig, requireConfig } from './config.js';
import { buildApiServices } from './services.js';
import { createApp } from './index.js';
import { errorMessage } from './lib/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

config({ path: resolve(__dirname, '..', '.env.local') });
config();

const settings = loadConfig();

try {
  requireConfig(settings, ['apiKey', 'supabaseUrl', 'supabaseKey', 'aiGatewayApiKey']);
} catch (error) {
  console.error(`❌ ${errorMessage(error)}`);
  process.exit(1);
}

const app = createApp(buildApiServices(settings));

serve({
  fetch: app.fetch,
  port: settings.port,
}, (info) => {
  console.log(`🚀 API running on http://localhost:${info.port}`);
});
