import { Hono } from 'hono';
import leadsRouter from './leads.js';
import type { AppEnv } from '../../../types.js';

const app = new Hono<AppEnv>();

app.route('/leads', leadsRouter);

export default app;
