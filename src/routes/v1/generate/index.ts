import { Hono } from 'hono';
import emailSequenceRouter from './email-sequence.js';
import type { AppEnv } from '../../../types.js';

const app = new Hono<AppEnv>();

app.route('/email-sequence', emailSequenceRouter);

export default app;
