import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ContextAssembler, DEFAULT_SYSTEM_PROMPT } from '../src/services/context-assembler.js';
import { EntityStateTracker } from '../src/services/entity-tracker.js';
import { HashingEmbeddingProvider } from '../src/services/embedding-provider.js';
import { SummaryMemoryBuffer } from '../src/services/memory-buffer.js';
import { VectorContextStore } from '../src/services/vector-store.js';
import {
  CompactionFailedError,
  EmbeddingUnavailableError,
  OversizedTurnError,
  ProviderError,
  TimeoutError,
  TurnInProgressError
} from '../src/errors.js';
import { TokenCounter } from '../src/utils/token-counter.js';
import type { CompletionResponse, EmbeddingProvider } from '../src/types/index.js';
import { fakeCompletion, fakeSummarizer, makeTempDir, tableEmbedder, textOfTokens } from './helpers.js';

const PARIS: CompletionResponse = {
  kind: 'cited',
  content: 'Paris is the capital of France.',
  citations: ['https://example.com/france']
};

describe('ContextAssembler', () => {
  let dir: { path: string; cleanup: () => void };

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  function openStore(embedder: EmbeddingProvider = new HashingEmbeddingProvider(64)): VectorContextStore {
    return new VectorContextStore({ directory: dir.path, collection: 'chat_history', embedder });
  }

  it('answers a first query and records it everywhere', async () => {
    const completion = fakeCompletion(PARIS);
    const memory = new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() });
    const entities = new EntityStateTracker();
    const store = openStore();
    const assembler = new ContextAssembler({ completion, memory, entities, store });

    const result = await assembler.ask('What is the capital of France?');

    const request = completion.complete.mock.calls[0][0];
    expect(request.messages).toEqual([
      { role: 'system', content: `${DEFAULT_SYSTEM_PROMPT}\nCurrent conversation context: No prior context available.` },
      { role: 'user', content: 'What is the capital of France?' }
    ]);
    expect(result).toEqual({
      answer: 'Paris is the capital of France.',
      citations: ['https://example.com/france'],
      retrieved: [],
      promptTokens: TokenCounter.countMessages(request.messages),
      lossyCompactions: [],
      partialFailures: [],
      degraded: []
    });

    expect(memory.activeWindow.map(turn => [turn.role, turn.content])).toEqual([
      ['user', 'What is the capital of France?'],
      ['assistant', 'Paris is the capital of France.']
    ]);
    expect(store.list().map(record => record.role)).toEqual(['user', 'assistant']);
    expect(entities.get('France')).toEqual({ name: 'France', attributes: { capital: 'Paris' } });
    expect(assembler.phase).toBe('idle');
  });

  it('carries entity context and the active window into the next turn', async () => {
    const completion = fakeCompletion(PARIS);
    const memory = new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() });
    const assembler = new ContextAssembler({
      completion,
      memory,
      entities: new EntityStateTracker(),
      store: openStore()
    });

    await assembler.ask('What is the capital of France?');
    completion.complete.mockResolvedValueOnce({ kind: 'plain', content: 'About 68 million people.' });
    const result = await assembler.ask('How many people live there?');

    const messages = completion.complete.mock.calls[1][0].messages;
    expect(messages).toHaveLength(4);
    expect(messages[0].content).toBe(`${DEFAULT_SYSTEM_PROMPT}\nCurrent conversation context: France: capital: Paris`);
    expect(messages.slice(1)).toEqual([
      { role: 'user', content: 'What is the capital of France?' },
      { role: 'assistant', content: 'Paris is the capital of France.' },
      { role: 'user', content: 'How many people live there?' }
    ]);
    // The only stored user record is still in the active window
    expect(result.retrieved).toEqual([]);
    expect(result.citations).toEqual([]);
  });

  it('includes the running summary in the preamble', async () => {
    const completion = fakeCompletion({ kind: 'plain', content: 'Fine.' });
    const memory = new SummaryMemoryBuffer({ tokenLimit: 50, summarizer: fakeSummarizer('short') });
    for (let i = 0; i < 6; i++) {
      await memory.put(memory.createTurn(i % 2 === 0 ? 'user' : 'assistant', textOfTokens(10, `turn ${i + 1}`), i));
    }
    const assembler = new ContextAssembler({ completion, memory, entities: new EntityStateTracker() });

    await assembler.ask('And now?');

    const messages = completion.complete.mock.calls[0][0].messages;
    expect(messages).toHaveLength(5);
    expect(messages[0].content).toBe(
      `${DEFAULT_SYSTEM_PROMPT}\nCurrent conversation context: No prior context available.` +
      '\n\n## Conversation Summary:\n\n[Previous conversation summary: short]'
    );
    expect(memory.totalTokens()).toBe(44);
  });

  it('recalls turns stored by an earlier session', async () => {
    const embedder = tableEmbedder(
      {
        'My favourite city is Lisbon.': [1, 0],
        'Noted, Lisbon.': [0, 1],
        'Which city do I like most?': [1, 0]
      },
      [0, 1]
    );

    const first = openStore(embedder);
    await new ContextAssembler({
      completion: fakeCompletion({ kind: 'plain', content: 'Noted, Lisbon.' }),
      memory: new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() }),
      entities: new EntityStateTracker(),
      store: first,
      sessionId: 'session-a',
      now: () => 1000
    }).ask('My favourite city is Lisbon.');
    await first.close();

    const completion = fakeCompletion({ kind: 'plain', content: 'Lisbon.' });
    const reopened = openStore(embedder);
    const result = await new ContextAssembler({
      completion,
      memory: new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() }),
      entities: new EntityStateTracker(),
      store: reopened,
      sessionId: 'session-b'
    }).ask('Which city do I like most?');

    expect(result.retrieved).toHaveLength(1);
    expect(result.retrieved[0]).toMatchObject({
      text: 'My favourite city is Lisbon.',
      role: 'user',
      timestamp: 1000,
      metadata: { sessionId: 'session-a' },
      score: 1
    });
    expect(completion.complete.mock.calls[0][0].messages[0].content).toBe(
      `${DEFAULT_SYSTEM_PROMPT}\nCurrent conversation context: No prior context available.` +
      '\n\n## Conversation History:\n\nUser: My favourite city is Lisbon.\n\nAnswer the latest query using this context.'
    );
    expect(reopened.size).toBe(4);
  });

  it('fills recall past records already in the active window', async () => {
    const embedder = tableEmbedder(
      {
        'alpha question': [1, 0],
        'beta question': [0.6, 0.8],
        'gamma question': [1, 0]
      },
      [0, 1]
    );
    const store = openStore(embedder);
    await store.insert('beta question', 'user', 1);
    const assembler = new ContextAssembler({
      completion: fakeCompletion({ kind: 'plain', content: 'ok' }),
      memory: new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() }),
      entities: new EntityStateTracker(),
      store,
      retrievalTopK: 1
    });

    await assembler.ask('alpha question');
    const result = await assembler.ask('gamma question');

    expect(result.retrieved.map(record => record.text)).toEqual(['beta question']);
  });

  it('scopes recall to the current session when asked to', async () => {
    const embedder = tableEmbedder({}, [1, 0]);
    const store = openStore(embedder);
    await store.insert('Other session question', 'user', 1, { sessionId: 'session-a' });

    const result = await new ContextAssembler({
      completion: fakeCompletion({ kind: 'plain', content: 'Hello.' }),
      memory: new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() }),
      entities: new EntityStateTracker(),
      store,
      sessionId: 'session-b',
      scopeRetrievalToSession: true
    }).ask('Hi there');

    expect(result.retrieved).toEqual([]);
  });

  it('leaves every store untouched when the provider fails', async () => {
    const completion = fakeCompletion(PARIS);
    completion.complete.mockRejectedValueOnce(new Error('503 Service Unavailable'));
    const memory = new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() });
    const entities = new EntityStateTracker();
    const store = openStore();
    const assembler = new ContextAssembler({ completion, memory, entities, store });

    const failure = await assembler.ask('What is the capital of France?').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderError);
    expect(failure).toMatchObject({ reason: '503 Service Unavailable', recoverable: true });
    expect(memory.history()).toHaveLength(0);
    expect(store.size).toBe(0);
    expect(entities.size).toBe(0);
    expect(assembler.phase).toBe('idle');
  });

  it('aborts a dispatch that exceeds its deadline', async () => {
    const completion = fakeCompletion(PARIS);
    let capturedSignal: AbortSignal | undefined;
    completion.complete.mockImplementation(request => {
      capturedSignal = request.signal;
      return new Promise<CompletionResponse>(() => undefined);
    });
    const memory = new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() });
    const assembler = new ContextAssembler({
      completion,
      memory,
      entities: new EntityStateTracker(),
      dispatchTimeoutMs: 20
    });

    const failure = await assembler.ask('Anyone there?').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderError);
    expect(failure).toMatchObject({ reason: 'timeout' });
    expect(failure instanceof ProviderError && failure.cause).toBeInstanceOf(TimeoutError);
    expect(capturedSignal?.aborted).toBe(true);
    expect(memory.history()).toHaveLength(0);
  });

  it('answers without recall when retrieval fails', async () => {
    const embed = vi.fn<(text: string, signal?: AbortSignal) => Promise<number[]>>().mockResolvedValue([1, 0]);
    const store = openStore({ embed });
    await store.insert('Earlier question', 'user', 1);
    embed.mockRejectedValueOnce(new Error('embedding service down'));

    const result = await new ContextAssembler({
      completion: fakeCompletion(PARIS),
      memory: new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() }),
      entities: new EntityStateTracker(),
      store
    }).ask('What is the capital of France?');

    expect(result.answer).toBe('Paris is the capital of France.');
    expect(result.retrieved).toEqual([]);
    expect(result.degraded).toHaveLength(1);
    expect(result.degraded[0].source).toBe('store');
    expect(result.degraded[0].error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(result.partialFailures).toEqual([]);
    expect(store.size).toBe(3);
  });

  it('reports a failed store write without losing the answer', async () => {
    const embed = vi.fn<(text: string, signal?: AbortSignal) => Promise<number[]>>()
      .mockRejectedValue(new Error('embedding service down'));
    const memory = new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() });
    const entities = new EntityStateTracker();
    const store = openStore({ embed });

    const result = await new ContextAssembler({ completion: fakeCompletion(PARIS), memory, entities, store })
      .ask('What is the capital of France?');

    expect(result.answer).toBe('Paris is the capital of France.');
    expect(result.partialFailures).toHaveLength(1);
    expect(result.partialFailures[0].stage).toBe('store');
    expect(result.partialFailures[0].error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(store.size).toBe(0);
    expect(memory.history()).toHaveLength(2);
    expect(entities.get('France')?.attributes).toEqual({ capital: 'Paris' });
  });

  it('reports a failed compaction as a memory update failure', async () => {
    const summarizer = fakeSummarizer();
    summarizer.summarize.mockRejectedValue(new Error('summarizer down'));
    const memory = new SummaryMemoryBuffer({ tokenLimit: 20, summarizer });

    const result = await new ContextAssembler({
      completion: fakeCompletion({ kind: 'plain', content: textOfTokens(12, 'answer') }),
      memory,
      entities: new EntityStateTracker()
    }).ask(textOfTokens(10, 'question'));

    expect(result.partialFailures).toHaveLength(1);
    expect(result.partialFailures[0].stage).toBe('memory');
    expect(result.partialFailures[0].error).toBeInstanceOf(CompactionFailedError);
    expect(memory.activeWindow).toHaveLength(2);
    expect(memory.hasPendingCompaction).toBe(true);
  });

  it('rejects a query larger than the buffer before dispatching', async () => {
    const completion = fakeCompletion(PARIS);
    const assembler = new ContextAssembler({
      completion,
      memory: new SummaryMemoryBuffer({ tokenLimit: 20, summarizer: fakeSummarizer() }),
      entities: new EntityStateTracker()
    });

    await expect(assembler.ask(textOfTokens(21))).rejects.toBeInstanceOf(OversizedTurnError);
    expect(completion.complete).not.toHaveBeenCalled();
    expect(assembler.phase).toBe('idle');
  });

  it('refuses a second turn while one is in flight', async () => {
    const completion = fakeCompletion(PARIS);
    let resolveAnswer: (response: CompletionResponse) => void = () => undefined;
    completion.complete.mockImplementation(
      () => new Promise<CompletionResponse>(resolve => {
        resolveAnswer = resolve;
      })
    );
    const assembler = new ContextAssembler({
      completion,
      memory: new SummaryMemoryBuffer({ tokenLimit: 200, summarizer: fakeSummarizer() }),
      entities: new EntityStateTracker()
    });

    const first = assembler.ask('one');
    await expect(assembler.ask('two')).rejects.toBeInstanceOf(TurnInProgressError);

    await vi.waitFor(() => expect(completion.complete).toHaveBeenCalledTimes(1));
    expect(assembler.phase).toBe('dispatching');
    resolveAnswer({ kind: 'plain', content: 'done' });

    await expect(first).resolves.toMatchObject({ answer: 'done' });
    expect(assembler.phase).toBe('idle');
  });
});
