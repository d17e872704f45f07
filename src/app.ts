import Fastify, { type FastifyBaseLogger } from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import type { LogPipeline } from './logging';
import { registerErrorHandler } from './plugins/error-handler';
import { registerRoutes } from './routes/index';
import type { ActionEventStore } from './services/action-event.service';

export interface BuildAppOptions {
  pipeline: LogPipeline;
  store: ActionEventStore;
  saveToFile: boolean;
  /** Request logger; without one Fastify logs nothing */
  logger?: FastifyBaseLogger;
}

export function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    loggerInstance: options.logger,
    requestTimeout: 30_000,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  registerErrorHandler(app);

  app.register(registerRoutes, {
    pipeline: options.pipeline,
    store: options.store,
    saveToFile: options.saveToFile,
  });

  return app;
}
