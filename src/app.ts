import { command, option, optional, string } from 'cmd-ts';
import type { ResolvedConfig } from './config/config-defaults.js';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config/config-loader.js';
import { ConversationMachine } from './conversation/conversation-machine.js';
import { ConversationStore } from './conversation/conversation-store.js';
import { classifyInput } from './conversation/menu.js';
import { DeliveryOrchestrator } from './delivery/delivery-orchestrator.js';
import { DownloadOrchestrator } from './downloader/download-orchestrator.js';
import { PayloadStore } from './downloader/payload-store.js';
import type { MediaEngine } from './engine/types.js';
import { checkFfmpegInstalled, YtdlpEngine } from './engine/ytdlp-engine.js';
import { ConfigError, errorMessage } from './errors/custom-errors.js';
import { RequestPipeline } from './pipeline/request-pipeline.js';
import { createDownloadRetryPolicy } from './queue/retry-strategy.js';
import { WorkerPool } from './queue/worker-pool.js';
import { SearchAdapter } from './search/search-adapter.js';
import { RetentionSweeper } from './sweeper/retention-sweeper.js';
import { type ChatBot, createGrammyBot } from './transport/bot.js';
import type { ChatTransport } from './transport/chat-transport.js';
import { GrammyTransport } from './transport/grammy-transport.js';
import { type Logger, logger } from './utils/logger.js';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  checkYtDlpInstalled: (binary: string) => Promise<boolean>;
  checkFfmpegInstalled: () => Promise<boolean>;
  createEngine: (settings: ResolvedConfig['download'], logger: Logger) => MediaEngine;
  createBot: (token: string, logger: Logger) => ChatBot;
  /** Register the shutdown routine for process signals */
  onShutdownSignal: (shutdown: () => Promise<void>) => void;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  checkYtDlpInstalled: (binary) => YtdlpEngine.checkInstalled(binary),
  checkFfmpegInstalled,
  createEngine: (settings, log) =>
    new YtdlpEngine({
      binary: settings.ytdlpPath,
      cookieFile: settings.cookieFile,
      socketTimeout: settings.socketTimeout,
      onLog: (message) => log.debug(message),
    }),
  createBot: createGrammyBot,
  onShutdownSignal: (shutdown) => {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown().then(
          () => process.exit(0),
          () => process.exit(1),
        );
      });
    }
  },
};

/**
 * Long-lived components of a running bot
 */
export type AppServices = {
  machine: ConversationMachine;
  pool: WorkerPool;
  payloadStore: PayloadStore;
  sweeper: RetentionSweeper;
};

export type ServiceInputs = {
  config: ResolvedConfig;
  engine: MediaEngine;
  transport: ChatTransport;
  canTranscode: boolean;
};

/**
 * Wire the request path from configuration
 */
export function createServices({ config, engine, transport, canTranscode }: ServiceInputs): AppServices {
  const payloadStore = new PayloadStore(config.storage.directory, { minSize: config.storage.minFileSize });

  const downloader = new DownloadOrchestrator({
    engine,
    store: payloadStore,
    canTranscode,
    retryPolicy: createDownloadRetryPolicy(config.download.maxAttempts, config.download.retryDelayMs),
    settleDelayMs: config.download.settleDelayMs,
  });
  const delivery = new DeliveryOrchestrator({
    transport,
    store: payloadStore,
    maxAttempts: config.delivery.maxAttempts,
    retryDelayMs: config.delivery.retryDelayMs,
  });
  const pipeline = new RequestPipeline(downloader, delivery);

  const poolLogger = logger.child('pool');
  const pool = new WorkerPool({
    concurrency: config.workers.concurrency,
    queueCapacity: config.workers.queueCapacity,
    onError: (error) => poolLogger.error(`Job failed: ${errorMessage(error)}`),
  });

  const machine = new ConversationMachine({
    transport,
    store: new ConversationStore(),
    pool,
    pipeline,
    search: new SearchAdapter(engine, pipeline),
    payloadStore,
    chatMinLevel: config.telegram.chatMinLevel,
  });

  const sweeper = new RetentionSweeper(payloadStore.directory, {
    intervalMs: config.storage.sweepIntervalMs,
    thresholdMs: config.storage.retentionMs,
  });

  return { machine, pool, payloadStore, sweeper };
}

/**
 * Handle graceful shutdown
 */
export async function handleShutdown(bot: ChatBot, services: AppServices): Promise<void> {
  logger.info('Shutting down gracefully...');

  try {
    services.sweeper.stop();
    await bot.stop();
    const { active, queued } = services.pool.getStatus();
    if (active + queued > 0) {
      logger.info(`Waiting for ${active + queued} request(s) to finish...`);
    }
    await services.pool.stop();
    logger.success('Shutdown complete');
  } catch (error) {
    logger.error(`Error during shutdown: ${errorMessage(error)}`);
  }
}

/**
 * Start the bot and poll until it is stopped
 *
 * @param configPath - Config file; when omitted, ./config.yaml is used if present
 * @throws ConfigError if the configuration is invalid or has no bot token
 * @throws Error if yt-dlp is not installed
 */
export async function runApp(
  configPath: string | undefined,
  deps: AppDependencies = defaultDependencies,
): Promise<void> {
  const path = configPath ?? DEFAULT_CONFIG_PATH;
  logger.info(`Loading configuration from ${path}...`);
  const config = await deps.loadConfig(path, { required: configPath !== undefined });
  logger.setLevel(config.logging.level);
  logger.setUseColors(config.logging.colors);
  logger.success('Configuration loaded');

  logger.info('Checking yt-dlp installation...');
  if (!(await deps.checkYtDlpInstalled(config.download.ytdlpPath))) {
    throw new Error(
      'yt-dlp is not installed. Please install it first:\n' +
        '  - macOS: brew install yt-dlp\n' +
        '  - Linux: pip install yt-dlp\n' +
        '  - Windows: winget install yt-dlp',
    );
  }

  const canTranscode = await deps.checkFfmpegInstalled();
  if (!canTranscode) {
    logger.warning('ffmpeg not found; audio will be sent in its original format');
  }

  const bot = deps.createBot(config.telegram.botToken, logger.child('bot'));
  const services = createServices({
    config,
    engine: deps.createEngine(config.download, logger.child('yt-dlp')),
    transport: new GrammyTransport(bot.api),
    canTranscode,
  });

  await services.payloadStore.ensureDirectory();
  const cleared = await services.sweeper.start();
  if (cleared.deleted > 0) {
    logger.info(`Removed ${cleared.deleted} leftover file(s) from ${services.payloadStore.directory}`);
  }

  bot.onText((requesterId, text) => services.machine.handle(requesterId, classifyInput(text)));
  deps.onShutdownSignal(() => handleShutdown(bot, services));

  logger.info(
    `Workers: ${config.workers.concurrency} (queue ${config.workers.queueCapacity}), storage: ${services.payloadStore.directory}`,
  );
  await bot.start();
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'clipcourier',
  description: 'Telegram bot that fetches videos and audio from supported sites and sends them back to the chat',
  version: '0.1.0',
  args: {
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Path to configuration file (default: ./config.yaml if present)',
    }),
  },
  handler: async ({ config }: { config: string | undefined }) => {
    try {
      await runApp(config);
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error(`Configuration error: ${error.message}`);
      } else {
        logger.error(`Fatal error: ${errorMessage(error)}`);
      }
      process.exit(1);
    }
  },
});
