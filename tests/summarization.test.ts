import { describe, expect, it } from 'vitest';
import { SummarizationService, formatSummary, summaryOverheadTokens } from '../src/services/summarization.js';
import { ProviderError } from '../src/errors.js';
import { createTurn } from '../src/utils/token-counter.js';
import { fakeCompletion } from './helpers.js';

describe('SummarizationService', () => {
  const turns = [
    createTurn('user', 'My budget is 1200 euros.', 1),
    createTurn('assistant', 'Noted, 1200 euros for the trip.', 2)
  ];

  it('sends the prior summary and the turns with a condensing instruction', async () => {
    const completion = fakeCompletion({ kind: 'plain', content: '  The user has a 1200 euro budget.  ' });
    const service = new SummarizationService(completion);
    const priorSummary = createTurn('system', formatSummary('The user is planning a trip to Lisbon.'), 0);

    const condensed = await service.summarize({ priorSummary, turns, targetTokens: 40 });

    expect(condensed).toBe('The user has a 1200 euro budget.');

    const request = completion.complete.mock.calls[0][0];
    expect(request.temperature).toBe(0.3);
    expect(request.maxTokens).toBe(40);
    expect(request.messages[0].role).toBe('system');
    expect(request.messages[0].content).toContain('Condense this conversation history, preserving facts, names, and figures.');
    expect(request.messages[0].content).toContain('Be at most 160 characters (about 40 tokens)');
    expect(request.messages[1]).toEqual({
      role: 'user',
      content:
        'Existing summary:\n[Previous conversation summary: The user is planning a trip to Lisbon.]\n\n' +
        'Conversation segment to fold in:\nuser: My budget is 1200 euros.\nassistant: Noted, 1200 euros for the trip.'
    });
  });

  it('omits the existing summary section on the first compaction', async () => {
    const completion = fakeCompletion({ kind: 'plain', content: 'Budget noted.' });
    await new SummarizationService(completion, { temperature: 0 }).summarize({ turns, targetTokens: 10 });

    const request = completion.complete.mock.calls[0][0];
    expect(request.temperature).toBe(0);
    expect(request.messages[1].content.startsWith('Conversation segment to fold in:')).toBe(true);
  });

  it('treats a blank summary as a provider failure', async () => {
    const service = new SummarizationService(fakeCompletion({ kind: 'plain', content: '   ' }));
    await expect(service.summarize({ turns, targetTokens: 10 })).rejects.toBeInstanceOf(ProviderError);
  });

  it('refuses to summarize nothing', async () => {
    const service = new SummarizationService(fakeCompletion({ kind: 'plain', content: 'x' }));
    await expect(service.summarize({ turns: [], targetTokens: 10 })).rejects.toThrow('Cannot summarize empty turn array');
  });
});

describe('formatSummary', () => {
  it('wraps condensed text in the summary marker', () => {
    expect(formatSummary(' facts ')).toBe('[Previous conversation summary: facts]');
    expect(summaryOverheadTokens()).toBe(9);
  });
});
