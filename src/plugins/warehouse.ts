/**
 * Fastify plugin exposing the service container as `fastify.warehouse`.
 */

import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { closeDb } from '../services/database.js';
import type { Warehouse } from '../services/warehouse.js';

export interface WarehousePluginOptions {
  warehouse: Warehouse;

  /**
   * Destroy the database handle when the server closes.
   * @default false
   */
  closeOnShutdown?: boolean;
}

declare module 'fastify' {
  interface FastifyInstance {
    warehouse: Warehouse;
  }
}

const warehousePlugin: FastifyPluginAsync<WarehousePluginOptions> = async (
  fastify,
  options
) => {
  const { warehouse, closeOnShutdown = false } = options;

  await warehouse.features.init();
  fastify.decorate('warehouse', warehouse);

  if (closeOnShutdown) {
    fastify.addHook('onClose', async () => {
      await closeDb(warehouse.db);
    });
  }
};

export default fp(warehousePlugin, {
  name: 'warehouse',
  fastify: '5.x',
});
