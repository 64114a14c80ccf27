import { Hono } from 'hono';
import classifyRoutes from './classify/index.js';
import filterRoutes from './filter/index.js';
import generateRoutes from './generate/index.js';
import prospectRoutes from './prospects/index.js';
import healthRoute from '../health.js';
import type { AppEnv } from '../../types.js';

const v1 = new Hono<AppEnv>();

v1.route('/classify', classifyRoutes);
v1.route('/filter', filterRoutes);
v1.route('/generate', generateRoutes);
v1.route('/prospects', prospectRoutes);
v1.route('/health', healthRoute);

export default v1;
