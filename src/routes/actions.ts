import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { Severity, type LogPipeline, type LogRecord } from '../logging';
import {
  actionParamsSchema,
  actionQuerySchema,
  actionRecordedResponseSchema,
  errorResponseSchema,
} from '../schemas/actions';
import {
  buildActionEvent,
  toLogFields,
  type ActionEventStore,
} from '../services/action-event.service';
import { EventSaveError } from '../utils/errors';

export const ACTION_LOG_TYPE = 'PHONE_ACTION';

export interface ActionRouteOptions {
  pipeline: LogPipeline;
  store: ActionEventStore;
  saveToFile: boolean;
}

/** Logging must never fail the request */
async function enqueueSafely(pipeline: LogPipeline, record: LogRecord, log: FastifyBaseLogger) {
  try {
    await pipeline.enqueue(record);
  } catch (err) {
    log.warn({ err }, 'Failed to enqueue log record');
  }
}

export async function actionRoutes(app: FastifyInstance, opts: ActionRouteOptions) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();
  const { pipeline, store, saveToFile } = opts;

  // GET /action/:customerId/:eventType - record a device action event
  typedApp.get(
    '/action/:customerId/:eventType',
    {
      schema: {
        description: 'Record an action event reported by a device',
        params: actionParamsSchema,
        querystring: actionQuerySchema,
        response: {
          200: actionRecordedResponseSchema,
          500: errorResponseSchema,
        },
      },
    },
    async (request) => {
      const event = buildActionEvent(request.params, request.query);

      if (saveToFile) {
        try {
          await store.save(event);
        } catch (err) {
          request.log.error({ err }, 'failed to save action event to file');

          const record = pipeline.buildLog(
            ACTION_LOG_TYPE,
            'ActionSaveFailed',
            Severity.ERROR,
            toLogFields(event),
            event.customerId,
            event.eventType,
          );
          record.attachError(err).addField('error', err instanceof Error ? err.message : String(err));
          await enqueueSafely(pipeline, record, request.log);

          throw new EventSaveError();
        }
      } else {
        request.log.debug(
          { customer_id: event.customerId, event_type: event.eventType },
          'SAVE_TO_FILE is disabled; event not written to disk',
        );
      }

      const record = pipeline.buildLog(
        ACTION_LOG_TYPE,
        'ActionRecorded',
        Severity.INFO,
        toLogFields(event),
        event.eventType,
        event.customerId,
      );
      await enqueueSafely(pipeline, record, request.log);

      return { message: 'Event recorded successfully' };
    },
  );
}
