import { Hono } from 'hono';
import type { AppEnv } from '../types.js';

const app = new Hono<AppEnv>();

app.get('/', (c) => {
  return c.json({
    status: 'ok',
    service: 'prospect-pipeline',
    timestamp: new Date().toISOString(),
    version: '0.1.0',
  });
});

export default app;
