import { Hono } from 'hono';
import statsRouter from './stats.js';
import statusRouter from './status.js';
import type { AppEnv } from '../../../types.js';

const app = new Hono<AppEnv>();

app.route('/stats', statsRouter);
app.route('/', statusRouter);

export default app;
