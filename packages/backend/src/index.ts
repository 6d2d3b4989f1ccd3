import 'dotenv/config';
import { buildApp } from './app.js';
import { getConfig } from './lib/config/app.js';
import { closeDatabase } from './lib/db.js';
import { ensureSeedAdmin } from './services/auth.service.js';

const config = getConfig();
const fastify = await buildApp();

fastify.addHook('onClose', async () => {
  closeDatabase();
});

const start = async () => {
  try {
    if (await ensureSeedAdmin(config)) {
      fastify.log.info({ email: config.seedAdmin?.email }, 'seeded admin account');
    }
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
