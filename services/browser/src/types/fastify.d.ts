import type { BrowserService } from '../services/browserService';

declare module 'fastify' {
  interface FastifyInstance {
    browserService: BrowserService;
  }
}
