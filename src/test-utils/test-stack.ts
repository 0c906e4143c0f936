import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeliveryOrchestrator } from '../delivery/delivery-orchestrator.js';
import { DownloadOrchestrator } from '../downloader/download-orchestrator.js';
import { PayloadStore } from '../downloader/payload-store.js';
import { RequestPipeline } from '../pipeline/request-pipeline.js';
import { createDownloadRetryPolicy } from '../queue/retry-strategy.js';
import { Logger, LogLevel } from '../utils/logger.js';
import { FakeEngine } from './fake-engine.js';
import { FakeTransport } from './fake-transport.js';

export const quietLogger = new Logger({ level: LogLevel.ERROR, useColors: false });

const noSleep = async (_ms: number): Promise<void> => {};

/**
 * Real orchestrators wired to the in-process engine and transport over a temp directory
 */
export async function createTestStack() {
  const dir = await mkdtemp(join(tmpdir(), 'clipcourier-test-'));
  const engine = new FakeEngine();
  const transport = new FakeTransport();
  const store = new PayloadStore(dir, { logger: quietLogger });

  const downloader = new DownloadOrchestrator({
    engine,
    store,
    canTranscode: true,
    retryPolicy: createDownloadRetryPolicy(3, 0),
    settleDelayMs: 0,
    logger: quietLogger,
    sleep: noSleep,
  });
  const delivery = new DeliveryOrchestrator({ transport, store, retryDelayMs: 0, logger: quietLogger, sleep: noSleep });
  const pipeline = new RequestPipeline(downloader, delivery, quietLogger);

  return {
    dir,
    engine,
    transport,
    store,
    pipeline,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export type TestStack = Awaited<ReturnType<typeof createTestStack>>;
