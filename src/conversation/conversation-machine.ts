import type { PayloadStore } from '../downloader/payload-store.js';
import { errorMessage, ValidationError } from '../errors/custom-errors.js';
import { ChatNotifier, CompositeNotifier, LogNotifier, NotificationLevel, type Notifier } from '../notifications/index.js';
import type { RequestPipeline } from '../pipeline/request-pipeline.js';
import type { WorkerPool } from '../queue/worker-pool.js';
import type { SearchAdapter } from '../search/search-adapter.js';
import type { ChatTransport, ReplyKeyboard } from '../transport/chat-transport.js';
import { createRequestContext, type Profile, type RequesterId } from '../types/media.types.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { isSupportedUrl } from '../utils/url-validator.js';
import { MIN_QUERY_LENGTH } from './constants.js';
import { AWAITING_SEARCH_QUERY, awaitingUrl, IDLE, processing } from './conversation-state.js';
import type { ConversationStore } from './conversation-store.js';
import { type ClassifiedInput, type Command, isProfileCommand, MENU_ROWS, PROFILE_COMMANDS } from './menu.js';
import {
  failureMessage,
  HELP_TEXT,
  QUERY_TOO_SHORT,
  REQUEST_ACCEPTED,
  SEARCH_PROMPT,
  STILL_WORKING,
  statusText,
  urlInstructions,
  WELCOME_TEXT,
} from './messages.js';

export type ConversationMachineOptions = {
  transport: ChatTransport;
  store: ConversationStore;
  pool: WorkerPool;
  pipeline: RequestPipeline;
  search: SearchAdapter;
  /** Storage usage for the status reply */
  payloadStore: PayloadStore;
  logger?: Logger;
  /** Lowest level of status messages sent to the chat by the default notifier */
  chatMinLevel?: NotificationLevel;
  /** Notifier for one job; defaults to chat + log */
  createNotifier?: (requesterId: RequesterId) => Notifier;
};

type Work = (notifier: Notifier) => Promise<unknown>;

const HIDE_KEYBOARD: ReplyKeyboard = { remove: true };

/**
 * Per-requester conversation flow
 *
 * Decides what each inbound message means given the requester's state and
 * hands accepted requests to the worker pool. Every job, however it ends,
 * puts the requester back to idle and shows the menu.
 */
export class ConversationMachine {
  private readonly transport: ChatTransport;
  private readonly store: ConversationStore;
  private readonly pool: WorkerPool;
  private readonly pipeline: RequestPipeline;
  private readonly search: SearchAdapter;
  private readonly payloadStore: PayloadStore;
  private readonly logger: Logger;
  private readonly chatMinLevel: NotificationLevel;
  private readonly createNotifier: (requesterId: RequesterId) => Notifier;

  constructor(options: ConversationMachineOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.pool = options.pool;
    this.pipeline = options.pipeline;
    this.search = options.search;
    this.payloadStore = options.payloadStore;
    this.logger = options.logger ?? defaultLogger.child('conversation');
    this.chatMinLevel = options.chatMinLevel ?? NotificationLevel.INFO;
    this.createNotifier = options.createNotifier ?? ((requesterId) => this.defaultNotifier(requesterId));
  }

  /**
   * Handle one inbound message; calls for the same requester never overlap
   */
  async handle(requesterId: RequesterId, input: ClassifiedInput): Promise<void> {
    await this.store.withLock(requesterId, () => this.dispatch(requesterId, input));
  }

  async showMenu(requesterId: RequesterId): Promise<void> {
    await this.transport.send(requesterId, WELCOME_TEXT, { rows: MENU_ROWS });
  }

  private async dispatch(requesterId: RequesterId, input: ClassifiedInput): Promise<void> {
    if (input.kind === 'command') {
      await this.onCommand(requesterId, input.command);
      return;
    }

    const state = this.store.get(requesterId);
    switch (state.kind) {
      case 'idle':
        await this.showMenu(requesterId);
        break;
      case 'processing':
        await this.transport.send(requesterId, STILL_WORKING);
        break;
      case 'awaitingUrl':
        await this.acceptUrl(requesterId, input.text, state.profile);
        break;
      case 'awaitingSearchQuery':
        await this.acceptQuery(requesterId, input.text);
        break;
    }
  }

  private async onCommand(requesterId: RequesterId, command: Command): Promise<void> {
    if (command === 'help') {
      await this.transport.send(requesterId, HELP_TEXT);
      return;
    }

    if (command === 'status') {
      const storage = await this.payloadStore.usage();
      await this.transport.send(
        requesterId,
        statusText({ pool: this.pool.getStatus(), requesters: this.store.processingCount(), storage }),
      );
      return;
    }

    if (this.store.get(requesterId).kind === 'processing') {
      await this.transport.send(requesterId, STILL_WORKING);
      return;
    }

    if (command === 'menu') {
      this.store.set(requesterId, IDLE);
      await this.showMenu(requesterId);
      return;
    }

    if (command === 'search') {
      this.store.set(requesterId, AWAITING_SEARCH_QUERY);
      await this.transport.send(requesterId, SEARCH_PROMPT, HIDE_KEYBOARD);
      return;
    }

    if (isProfileCommand(command)) {
      const { profile, description } = PROFILE_COMMANDS[command];
      this.store.set(requesterId, awaitingUrl(profile));
      await this.transport.send(requesterId, urlInstructions(description), HIDE_KEYBOARD);
    }
  }

  private async acceptUrl(requesterId: RequesterId, text: string, profile: Profile): Promise<void> {
    if (!isSupportedUrl(text)) {
      this.logger.debug(`Rejected URL from ${requesterId}: ${text}`);
      await this.rejectInput(requesterId, failureMessage(new ValidationError('Unsupported URL', text)));
      return;
    }

    const ctx = createRequestContext(requesterId, text, profile);
    await this.submit(requesterId, (notifier) => this.pipeline.run(ctx, notifier));
  }

  private async acceptQuery(requesterId: RequesterId, text: string): Promise<void> {
    const query = text.trim();
    if (query.length < MIN_QUERY_LENGTH) {
      await this.rejectInput(requesterId, QUERY_TOO_SHORT);
      return;
    }

    await this.submit(requesterId, (notifier) => this.search.searchAndFetch(requesterId, query, notifier));
  }

  private async rejectInput(requesterId: RequesterId, message: string): Promise<void> {
    this.store.set(requesterId, IDLE);
    await this.transport.send(requesterId, message);
    await this.showMenu(requesterId);
  }

  /**
   * Hand work to the pool; the requester is processing only once the pool took it
   */
  private async submit(requesterId: RequesterId, work: Work): Promise<void> {
    try {
      this.pool.submit(() => this.runJob(requesterId, work));
    } catch (error) {
      this.logger.warning(`Refused request from ${requesterId}: ${errorMessage(error)}`);
      await this.rejectInput(requesterId, failureMessage(error));
      return;
    }

    this.store.set(requesterId, processing());
    await this.transport.send(requesterId, REQUEST_ACCEPTED);
  }

  private async runJob(requesterId: RequesterId, work: Work): Promise<void> {
    const notifier = this.createNotifier(requesterId);

    try {
      await work(notifier);
    } catch (error) {
      this.logger.error(`Request from ${requesterId} failed: ${errorMessage(error)}`);
      await this.sendQuietly(requesterId, failureMessage(error));
    } finally {
      await this.store.withLock(requesterId, async () => {
        this.store.set(requesterId, IDLE);
        await this.showMenu(requesterId).catch((error: unknown) => {
          this.logger.warning(`Failed to show menu to ${requesterId}: ${errorMessage(error)}`);
        });
      });
    }
  }

  private async sendQuietly(requesterId: RequesterId, text: string): Promise<void> {
    try {
      await this.transport.send(requesterId, text);
    } catch (error) {
      this.logger.warning(`Failed to message ${requesterId}: ${errorMessage(error)}`);
    }
  }

  private defaultNotifier(requesterId: RequesterId): Notifier {
    return new CompositeNotifier(
      [
        new ChatNotifier(this.transport, requesterId, this.logger, { minLevel: this.chatMinLevel }),
        new LogNotifier(this.logger.child(String(requesterId)), NotificationLevel.DEBUG),
      ],
      this.logger,
    );
  }
}
