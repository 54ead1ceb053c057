import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import type { GarbageCollector } from '../../maintenance/garbage-collector.js';

export interface MaintenanceRoutesOptions {
  garbageCollector: GarbageCollector;
}

export function createMaintenanceRoutes(options: MaintenanceRoutesOptions) {
  const { garbageCollector } = options;
  const app = new Hono<AuthEnv>();

  // Run a collection pass now
  app.post('/gc', async (c) => {
    const removed = await garbageCollector.runOnce();
    return c.json(removed);
  });

  return app;
}
