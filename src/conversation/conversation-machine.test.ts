import { readdir } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TransientFetchError } from '../errors/custom-errors.js';
import { ChatNotifier } from '../notifications/chat-notifier.js';
import { WorkerPool } from '../queue/worker-pool.js';
import { SearchAdapter } from '../search/search-adapter.js';
import { createTestStack, quietLogger, type TestStack } from '../test-utils/test-stack.js';
import type { RequesterId } from '../types/media.types.js';
import { ConversationMachine } from './conversation-machine.js';
import { ConversationStore } from './conversation-store.js';
import { classifyInput, MENU_ROWS } from './menu.js';
import {
  BUSY_MESSAGE,
  HELP_TEXT,
  QUERY_TOO_SHORT,
  REQUEST_ACCEPTED,
  SEARCH_PROMPT,
  STILL_WORKING,
  UNSUPPORTED_URL,
  urlInstructions,
  WELCOME_TEXT,
} from './messages.js';

const USER = 101;

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConversationMachine', () => {
  let stack: TestStack;
  let store: ConversationStore;
  let pool: WorkerPool;
  let machine: ConversationMachine;

  function build(poolOptions: { concurrency?: number; queueCapacity?: number } = {}) {
    store = new ConversationStore();
    pool = new WorkerPool({ ...poolOptions, onError: () => {} });
    machine = new ConversationMachine({
      transport: stack.transport,
      store,
      pool,
      pipeline: stack.pipeline,
      search: new SearchAdapter(stack.engine, stack.pipeline, quietLogger),
      payloadStore: stack.store,
      logger: quietLogger,
      createNotifier: (requesterId) =>
        new ChatNotifier(stack.transport, requesterId, quietLogger, { random: () => 1 }),
    });
  }

  beforeEach(async () => {
    stack = await createTestStack();
    build();
  });

  afterEach(async () => {
    await pool.drain();
    await stack.cleanup();
  });

  const say = (requesterId: RequesterId, text: string) => machine.handle(requesterId, classifyInput(text));

  it('should render the menu for free text while idle', async () => {
    await say(USER, 'hello');

    expect(stack.transport.messages).toEqual([{ requesterId: USER, text: WELCOME_TEXT, keyboard: { rows: MENU_ROWS } }]);
    expect(store.get(USER)).toEqual({ kind: 'idle' });
  });

  it('should download, deliver and return to the menu for a valid URL', async () => {
    await say(USER, '📥 Download Video');
    expect(store.get(USER)).toEqual({
      kind: 'awaitingUrl',
      profile: { mediaType: 'video', quality: 'best' },
    });
    expect(stack.transport.messages[0]?.keyboard).toEqual({ remove: true });

    await say(USER, 'youtu.be/abc');
    await pool.drain();

    expect(stack.engine.probeCalls).toEqual(['https://youtu.be/abc']);
    expect(stack.transport.media.map((m) => [m.requesterId, m.kind, m.size])).toEqual([[USER, 'video', 4096]]);
    expect(stack.transport.textsFor(USER)).toEqual([
      urlInstructions('High Quality Video Download'),
      REQUEST_ACCEPTED,
      '🔍 Starting download...',
      '📥 Downloading <b>Test Clip</b>',
      '🔍 Uploading file...',
      '✅ Upload successful!',
      WELCOME_TEXT,
    ]);
    expect(store.get(USER)).toEqual({ kind: 'idle' });
    expect(await readdir(stack.dir)).toEqual([]);
  });

  it('should reject an unsupported URL without touching the engine', async () => {
    await say(USER, '⚡ Fast Download');
    await say(USER, 'https://example.com/video');

    expect(stack.engine.probeCalls).toEqual([]);
    expect(stack.transport.textsFor(USER).slice(1)).toEqual([UNSUPPORTED_URL, WELCOME_TEXT]);
    expect(store.get(USER)).toEqual({ kind: 'idle' });
    expect(pool.getStatus().completedCount).toBe(0);
  });

  it('should never leave a requester processing after a failed job', async () => {
    stack.engine.probeError = new TransientFetchError('timed out', 'https://youtu.be/abc');

    await say(USER, '🎵 Audio Only');
    await say(USER, 'https://youtu.be/abc');
    await pool.drain();

    expect(stack.engine.probeCalls).toHaveLength(3);
    expect(store.get(USER)).toEqual({ kind: 'idle' });
    expect(stack.transport.textsFor(USER).slice(-2)).toEqual([
      '❌ <b>Download failed</b> - All 3 attempts failed. Please try again later.',
      WELCOME_TEXT,
    ]);

    await say(USER, 'anything');
    expect(stack.transport.textsFor(USER).at(-1)).toBe(WELCOME_TEXT);
  });

  it('should return to idle even when the failure message cannot be sent', async () => {
    const gate = deferred();
    stack.engine.holdProbe = gate.promise;
    stack.engine.probeError = new TransientFetchError('timed out', 'https://youtu.be/abc');
    await say(USER, '📥 Download Video');
    await say(USER, 'https://youtu.be/abc');
    const send = stack.transport.send.bind(stack.transport);
    stack.transport.send = async (requesterId, text, keyboard) => {
      if (text.startsWith('❌')) throw new Error('chat unreachable');
      await send(requesterId, text, keyboard);
    };

    gate.resolve();
    await pool.drain();

    expect(store.get(USER)).toEqual({ kind: 'idle' });
    expect(stack.transport.textsFor(USER).at(-1)).toBe(WELCOME_TEXT);
  });

  it('should answer every input but help and status with "still working" while processing', async () => {
    const gate = deferred();
    stack.engine.holdProbe = gate.promise;

    await say(USER, '📥 Download Video');
    await say(USER, 'https://youtu.be/abc');
    expect(store.get(USER).kind).toBe('processing');

    await say(USER, 'https://youtu.be/other');
    await say(USER, '⚡ Fast Download');
    await say(USER, '/start');
    await say(USER, 'ℹ️ Help');
    await say(USER, '/status');

    const texts = stack.transport.textsFor(USER);
    expect(texts.filter((text) => text === STILL_WORKING)).toHaveLength(3);
    expect(texts).toContain(HELP_TEXT);
    expect(texts.find((text) => text.startsWith('📊'))).toContain('<b>Downloads running:</b> 1/4');
    expect(texts.find((text) => text.startsWith('📊'))).toContain('<b>Users served now:</b> 1');
    expect(store.get(USER).kind).toBe('processing');

    gate.resolve();
    await pool.drain();

    expect(stack.engine.probeCalls).toEqual(['https://youtu.be/abc']);
    expect(store.get(USER)).toEqual({ kind: 'idle' });
  });

  it('should send a busy message and stay idle when the pool is full', async () => {
    build({ concurrency: 1, queueCapacity: 0 });
    const gate = deferred();
    stack.engine.holdProbe = gate.promise;

    await say(1, '📥 Download Video');
    await say(1, 'https://youtu.be/first');
    await say(2, '📥 Download Video');
    await say(2, 'https://youtu.be/second');

    expect(stack.transport.textsFor(2).slice(-2)).toEqual([BUSY_MESSAGE, WELCOME_TEXT]);
    expect(store.get(2)).toEqual({ kind: 'idle' });
    expect(store.get(1).kind).toBe('processing');

    gate.resolve();
    await pool.drain();
    expect(store.get(1)).toEqual({ kind: 'idle' });
  });

  describe('search', () => {
    it('should prompt for a query and hide the keyboard', async () => {
      await say(USER, '🔍 Search Music');

      expect(store.get(USER)).toEqual({ kind: 'awaitingSearchQuery' });
      expect(stack.transport.messages).toEqual([{ requesterId: USER, text: SEARCH_PROMPT, keyboard: { remove: true } }]);
    });

    it('should reject a one-character query', async () => {
      await say(USER, '🔍 Search Music');
      await say(USER, ' a ');

      expect(stack.engine.searchCalls).toEqual([]);
      expect(stack.transport.textsFor(USER).slice(1)).toEqual([QUERY_TOO_SHORT, WELCOME_TEXT]);
      expect(store.get(USER)).toEqual({ kind: 'idle' });
    });

    it('should report an empty search and return to the menu', async () => {
      await say(USER, '🔍 Search Music');
      await say(USER, 'nothing matches');
      await pool.drain();

      expect(stack.engine.searchCalls).toEqual([{ query: 'nothing matches', limit: 3 }]);
      expect(stack.transport.textsFor(USER).slice(-2)).toEqual(['❌ <b>No results found</b>', WELCOME_TEXT]);
      expect(store.get(USER)).toEqual({ kind: 'idle' });
    });

    it('should deliver the first hit as audio', async () => {
      stack.engine.searchResults = [{ title: 'Song', url: 'https://www.youtube.com/watch?v=song', duration: 200 }];

      await say(USER, '/search');
      await say(USER, 'my song');
      await pool.drain();

      expect(stack.transport.media.map((m) => m.kind)).toEqual(['audio']);
      expect(store.get(USER)).toEqual({ kind: 'idle' });
    });
  });

  it('should go back to the menu from any waiting state', async () => {
    await say(USER, '🎬 HD Download');
    await say(USER, '/menu');

    expect(store.get(USER)).toEqual({ kind: 'idle' });
    expect(stack.transport.textsFor(USER).at(-1)).toBe(WELCOME_TEXT);
  });

  it('should keep requesters independent', async () => {
    await say(1, '🎵 Audio Only');
    await say(2, '🔍 Search Music');

    expect(store.get(1).kind).toBe('awaitingUrl');
    expect(store.get(2).kind).toBe('awaitingSearchQuery');
  });
});
