import type { FastifyInstance } from 'fastify';
import type { LogPipeline } from '../logging';
import type { ActionEventStore } from '../services/action-event.service';
import { actionRoutes } from './actions';
import { healthRoutes } from './health';

export interface AppRouteOptions {
  pipeline: LogPipeline;
  store: ActionEventStore;
  saveToFile: boolean;
}

export async function registerRoutes(app: FastifyInstance, opts: AppRouteOptions) {
  app.register(healthRoutes, { pipeline: opts.pipeline });
  app.register(actionRoutes, opts);
}
