import { Hono } from 'hono';
import companyRouter from './company.js';
import type { AppEnv } from '../../../types.js';

const app = new Hono<AppEnv>();

app.route('/company', companyRouter);

export default app;
