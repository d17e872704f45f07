import { buildApp } from './app';
import { loadEnv } from './config/env';
import { createLogPipeline, createLogger, initLogger } from './logging';
import { FileActionEventStore } from './services/action-event.service';

const env = loadEnv();

initLogger({ level: env.LOG_LEVEL, pretty: env.NODE_ENV === 'development' });
const log = createLogger('main');

const pipeline = createLogPipeline({
  logger: createLogger('dispatcher'),
  loki: {
    enabled: env.LOKI_ENABLED,
    pushUrl: env.LOKI_PUSH_URL,
    username: env.LOKI_USERNAME,
    password: env.LOKI_PASSWORD,
    job: env.LOKI_JOB,
    timeoutMs: env.LOKI_TIMEOUT_MS,
  },
});

const app = buildApp({
  pipeline,
  store: new FileActionEventStore(env.DATA_DIR),
  saveToFile: env.SAVE_TO_FILE,
  logger: createLogger('http'),
});

log.info(
  {
    loki_enabled: env.LOKI_ENABLED,
    loki_push_url: env.LOKI_PUSH_URL,
    loki_job: env.LOKI_JOB,
    save_to_file: env.SAVE_TO_FILE,
    data_dir: env.DATA_DIR,
  },
  'Initialized action event logger',
);

async function start() {
  try {
    await app.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    log.error({ err }, 'Failed to start server');
    await pipeline.shutdown();
    process.exit(1);
  }
}

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) return;
  shuttingDown = true;

  log.info({ signal }, 'Shutting down...');
  // Stop producers first, then drain the dispatcher
  await app.close();
  await pipeline.shutdown();
  log.info('Shutdown complete');
  process.exit(0);
}

function onSignal(signal: NodeJS.Signals) {
  shutdown(signal).catch((err: unknown) => {
    log.error({ err }, 'Shutdown failed');
    process.exit(1);
  });
}

process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);

void start();
