import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { CampusSystem } from '../application/campus-system.js';

export interface CampusPluginOptions {
  system: CampusSystem;
}

/**
 * Fastify plugin that exposes the campus system to routes.
 *
 * The system is built by the caller and passed in; the plugin only
 * decorates `fastify.campus` and releases the store on shutdown.
 */
async function campusPlugin(fastify: FastifyInstance, opts: CampusPluginOptions): Promise<void> {
  fastify.decorate('campus', opts.system);

  fastify.addHook('onClose', async () => {
    await opts.system.close();
    fastify.log.info('Campus store closed');
  });
}

export default fp(campusPlugin, {
  name: 'campus',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.campus` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    campus: CampusSystem;
  }
}
