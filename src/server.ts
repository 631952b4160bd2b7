import { buildApp } from './app.js';
import { CONFIG } from './constants.js';

const fastify = buildApp();

fastify.listen({ port: CONFIG.PORT, host: CONFIG.HOST }).catch(err => {
  fastify.log.error(err);
  process.exit(1);
});
