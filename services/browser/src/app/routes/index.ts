import type { FastifyInstance } from 'fastify';
import { registerBrowseRoutes } from './modules/browse';
import { registerHealthRoutes } from './modules/health';

export const registerRoutes = async (app: FastifyInstance) => {
  await app.register(registerHealthRoutes);
  await app.register(registerBrowseRoutes);
};
