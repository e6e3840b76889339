import { CatalogTransportError } from '../../../src/catalog/errors.js';
import type { CatalogClient, SeriesDetail } from '../../../src/catalog/types.js';
import { defaultChatConfig, type ChatConfig } from '../../../src/config/chat.js';
import {
  CATALOG_UNAVAILABLE_REPLY,
  CHAT_FALLBACK_REPLY,
  HELP_REPLY,
  ResponseComposer,
  composeClarify,
} from '../../../src/core/composers.js';
import { IntentExtractor } from '../../../src/core/intent_extractor.js';
import type { LlmClient } from '../../../src/core/llm.js';
import { Orchestrator } from '../../../src/core/orchestrator.js';
import { createSessionMemory, type SessionMemory } from '../../../src/core/session_store.js';
import { silentLogger } from '../../../src/util/logging.js';
import { FakeCatalog, ScriptedLlm, intentJson, scriptedLlm } from '../../helpers/fakes.js';

const open: Array<{ orchestrator: Orchestrator; memory: SessionMemory }> = [];

function build(llm: LlmClient, catalog: CatalogClient = new FakeCatalog(), overrides: Partial<ChatConfig> = {}) {
  const log = silentLogger();
  const memory = createSessionMemory({ historyWindow: 10, ttlSec: 0, maxSessions: 0, sweepIntervalMs: 60_000 });
  const orchestrator = new Orchestrator({
    memory,
    extractor: new IntentExtractor(llm, log, { timeoutMs: 1000 }),
    catalog,
    composer: new ResponseComposer(llm, log, { timeoutMs: 1000 }),
    log,
    config: defaultChatConfig(overrides),
    historyWindow: 10,
  });
  open.push({ orchestrator, memory });
  return { orchestrator, memory };
}

function transcript(memory: SessionMemory, id: string): string[] {
  return memory.getHistory(id, 100).map((t) => `${t.role}:${t.content}`);
}

afterEach(async () => {
  for (const { orchestrator, memory } of open.splice(0)) {
    await orchestrator.close();
    memory.dispose();
  }
});

describe('Orchestrator', () => {
  it('answers a details question from the catalog record', async () => {
    const catalog = new FakeCatalog();
    const { orchestrator, memory } = build(scriptedLlm([intentJson('GET_DETAILS', { title: 'Breaking Bad' })]), catalog);

    const res = await orchestrator.handleMessage('Tell me about Breaking Bad');

    expect(res.replyText).toBe(
      [
        'Breaking Bad (2008)',
        'Network: AMC',
        'Genres: Drama, Crime',
        'Status: Ended',
        'First aired: 2008-01-20',
        '',
        "A chemistry teacher diagnosed with cancer starts cooking meth to secure his family's future.",
      ].join('\n'),
    );
    expect(catalog.calls).toEqual([
      { method: 'search', arg: 'Breaking Bad', limit: 5 },
      { method: 'getSeries', arg: '81189' },
    ]);
    expect(memory.getSlots(res.sessionId)).toEqual({ lastSeriesId: '81189', lastSeriesTitle: 'Breaking Bad' });
    expect(transcript(memory, res.sessionId)).toEqual([
      'user:Tell me about Breaking Bad',
      `assistant:${res.replyText}`,
    ]);
  });

  it('resolves a follow-up similar request through the carried series id', async () => {
    const catalog = new FakeCatalog();
    const llm = scriptedLlm([
      intentJson('GET_DETAILS', { title: 'Stranger Things' }),
      intentJson('FIND_SIMILAR', { title: null }),
    ]);
    const { orchestrator, memory } = build(llm, catalog);

    const first = await orchestrator.handleMessage('Tell me about Stranger Things');
    const second = await orchestrator.handleMessage('Find me something similar', first.sessionId);

    expect(second.sessionId).toBe(first.sessionId);
    expect(second.replyText).toBe(
      [
        'If you liked Stranger Things, you might enjoy:',
        '1. Game of Thrones (2011, HBO) — Drama, Fantasy',
        '2. Dark (2017, Netflix) — Drama, Science Fiction',
      ].join('\n'),
    );
    expect(catalog.calls.map((c) => `${c.method}:${c.arg}`)).toEqual([
      'search:Stranger Things',
      'getSeries:305288',
      'getSimilar:305288',
    ]);
    expect(llm.prompts[1]).toContain('User: Tell me about Stranger Things\nAssistant: Stranger Things (2016)');
    expect(llm.prompts[1]).toContain('Latest user message:\nFind me something similar');
    expect(memory.getSlots(first.sessionId).lastSeriesId).toBe('305288');
  });

  it('replies politely when nothing matches and leaves carried slots alone', async () => {
    const { orchestrator, memory } = build(
      scriptedLlm([intentJson('SEARCH_BY_TITLE', { title: 'Nonexistent Show XYZ' })]),
    );

    const res = await orchestrator.handleMessage('Find Nonexistent Show XYZ');

    expect(res.replyText).toBe(
      'I couldn\'t find any series matching "Nonexistent Show XYZ". Could you check the title or try another name?',
    );
    expect(memory.getSlots(res.sessionId)).toEqual({});
  });

  it('lists search results and carries the top one', async () => {
    const { orchestrator, memory } = build(scriptedLlm([intentJson('SEARCH_BY_TITLE', { title: 'Breaking' })]));

    const res = await orchestrator.handleMessage('find Breaking');

    expect(res.replyText).toBe(
      [
        'I found 1 series matching "Breaking":',
        '1. Breaking Bad (2008, AMC) — Drama, Crime',
        "   A chemistry teacher diagnosed with cancer starts cooking meth to secure his family's future.",
      ].join('\n'),
    );
    expect(memory.getSlots(res.sessionId)).toEqual({ lastSeriesId: '81189', lastSeriesTitle: 'Breaking Bad' });
  });

  it('turns a catalog transport failure into a transient-failure reply', async () => {
    const catalog = new FakeCatalog();
    catalog.failWith = new CatalogTransportError('tvdb_http_503', { status: 503, retryable: true });
    const { orchestrator, memory } = build(scriptedLlm([intentJson('GET_DETAILS', { title: 'Breaking Bad' })]), catalog);

    const res = await orchestrator.handleMessage('Tell me about Breaking Bad');

    expect(res.replyText).toBe(CATALOG_UNAVAILABLE_REPLY);
    expect(memory.getSlots(res.sessionId)).toEqual({});
    expect(transcript(memory, res.sessionId)).toHaveLength(2);
  });

  it('treats a slow catalog as unavailable', async () => {
    const catalog = new FakeCatalog();
    catalog.delayMs = 500;
    const { orchestrator } = build(
      scriptedLlm([intentJson('SEARCH_BY_TITLE', { title: 'Dark' })]),
      catalog,
      { catalogTimeoutMs: 20 },
    );

    const res = await orchestrator.handleMessage('find Dark');

    expect(res.replyText).toBe(CATALOG_UNAVAILABLE_REPLY);
  });

  it('still records the turn when something unexpected breaks', async () => {
    const catalog = new FakeCatalog();
    catalog.failWith = new Error('boom');
    const { orchestrator, memory } = build(scriptedLlm([intentJson('SEARCH_BY_TITLE', { title: 'Dark' })]), catalog);

    const res = await orchestrator.handleMessage('find Dark');

    expect(res.replyText).toBe(CATALOG_UNAVAILABLE_REPLY);
    expect(transcript(memory, res.sessionId)).toEqual(['user:find Dark', `assistant:${CATALOG_UNAVAILABLE_REPLY}`]);
  });

  it('passes year and network from the message to the catalog search', async () => {
    const catalog = new FakeCatalog();
    const { orchestrator } = build(
      scriptedLlm([intentJson('SEARCH_BY_TITLE', { title: 'Dark', year: 2017, network: 'Netflix' })]),
      catalog,
    );

    const res = await orchestrator.handleMessage('the 2017 Netflix show Dark');

    expect(catalog.calls).toEqual([{ method: 'search', arg: 'Dark', limit: 5, year: 2017, network: 'Netflix' }]);
    expect(res.replyText).toBe(
      ['I found 1 series matching "Dark":', '1. Dark (2017, Netflix) — Drama, Science Fiction'].join('\n'),
    );
  });

  it('narrows recommendations to the requested year', async () => {
    const catalog = new FakeCatalog();
    const { orchestrator } = build(
      scriptedLlm([intentJson('RECOMMEND_BY_PREFERENCE', { genre: 'Drama', year: 2011 })]),
      catalog,
    );

    const res = await orchestrator.handleMessage('a drama from 2011');

    expect(catalog.calls).toEqual([{ method: 'search', arg: 'Drama', limit: 15, year: 2011 }]);
    expect(res.replyText).toBe(
      ['Here are some Drama series from 2011 you might like:', '1. Game of Thrones (2011, HBO) — Drama, Fantasy'].join(
        '\n',
      ),
    );
  });

  describe('catalog failures during a lookup', () => {
    const carried = { lastSeriesId: '81189', lastSeriesTitle: 'Breaking Bad', lastGenreFilter: 'Crime' };

    const lookups: Array<[string, Record<string, string>]> = [
      ['SEARCH_BY_TITLE', { title: 'Dark' }],
      ['GET_DETAILS', { title: 'Dark' }],
      ['FIND_SIMILAR', { title: 'Dark' }],
      ['RECOMMEND_BY_PREFERENCE', { genre: 'Drama' }],
    ];

    it.each(lookups)('%s answers with the unavailable reply and keeps carried slots', async (intent, slots) => {
      const catalog = new FakeCatalog();
      catalog.failWith = new CatalogTransportError('tvdb_network_error', { retryable: true });
      const { orchestrator, memory } = build(scriptedLlm([intentJson(intent, slots)]), catalog);
      const id = memory.create();
      memory.setSlots(id, carried);

      const res = await orchestrator.handleMessage('look it up', id);

      expect(res).toEqual({ replyText: CATALOG_UNAVAILABLE_REPLY, sessionId: id });
      expect(memory.getSlots(id)).toEqual(carried);
    });

    it('reports a series without similar titles as not found', async () => {
      const catalog = new FakeCatalog();
      const { orchestrator, memory } = build(
        scriptedLlm([intentJson('FIND_SIMILAR', { title: 'Breaking Bad' })]),
        catalog,
      );
      const id = memory.create();
      memory.setSlots(id, carried);

      const res = await orchestrator.handleMessage('anything like Breaking Bad?', id);

      expect(res.replyText).toBe("I couldn't find series similar to Breaking Bad in the catalog.");
      expect(catalog.calls.map((c) => `${c.method}:${c.arg}`)).toEqual(['search:Breaking Bad', 'getSimilar:81189']);
      expect(memory.getSlots(id)).toEqual(carried);
    });

    it('reports a carried series that has left the catalog as not found', async () => {
      const stale = { lastSeriesId: '999999', lastSeriesTitle: 'Vanished Show' };
      const catalog = new FakeCatalog();
      const { orchestrator, memory } = build(scriptedLlm([intentJson('GET_DETAILS')]), catalog);
      const id = memory.create();
      memory.setSlots(id, stale);

      const res = await orchestrator.handleMessage('tell me more about it', id);

      expect(res.replyText).toBe(
        'I couldn\'t find any series matching "Vanished Show". Could you check the title or try another name?',
      );
      expect(catalog.calls).toEqual([{ method: 'getSeries', arg: '999999' }]);
      expect(memory.getSlots(id)).toEqual(stale);
    });
  });

  it('asks for clarification when the model output is malformed', async () => {
    const catalog = new FakeCatalog();
    const { orchestrator } = build(scriptedLlm(['Sure! The intent is probably details.']), catalog);

    const res = await orchestrator.handleMessage('hmm');

    expect(res.replyText).toBe(composeClarify('unclear'));
    expect(catalog.calls).toHaveLength(0);
  });

  it('asks for clarification when the model call fails', async () => {
    const { orchestrator } = build(scriptedLlm([new Error('provider down')]));
    const res = await orchestrator.handleMessage('tell me about it');
    expect(res.replyText).toBe(composeClarify('unclear'));
  });

  it('does not act on a low-confidence intent', async () => {
    const catalog = new FakeCatalog();
    const { orchestrator } = build(scriptedLlm([intentJson('GET_DETAILS', { title: 'Dark' }, 0.2)]), catalog);

    const res = await orchestrator.handleMessage('dark?');

    expect(res.replyText).toBe(composeClarify('unclear'));
    expect(catalog.calls).toHaveLength(0);
  });

  it('asks which series is meant when details have no title and nothing is carried', async () => {
    const { orchestrator } = build(scriptedLlm([intentJson('GET_DETAILS')]));
    const res = await orchestrator.handleMessage('tell me more about it');
    expect(res.replyText).toBe(composeClarify('missing_title'));
  });

  it('asks for a preference when a recommendation has nothing to go on', async () => {
    const { orchestrator } = build(scriptedLlm([intentJson('RECOMMEND_BY_PREFERENCE')]));
    const res = await orchestrator.handleMessage('recommend me something');
    expect(res.replyText).toBe(composeClarify('missing_preference'));
  });

  it('recommends by network and records the preference', async () => {
    const catalog = new FakeCatalog();
    const { orchestrator, memory } = build(
      scriptedLlm([intentJson('RECOMMEND_BY_PREFERENCE', { network: 'HBO' })]),
      catalog,
    );

    const res = await orchestrator.handleMessage('something on HBO');

    expect(res.replyText).toBe(
      [
        'Here are some series on HBO you might like:',
        '1. Game of Thrones (2011, HBO) — Drama, Fantasy',
        '2. The Wire (2002, HBO) — Drama, Crime',
      ].join('\n'),
    );
    expect(catalog.calls).toEqual([{ method: 'search', arg: 'HBO', limit: 15 }]);
    expect(memory.getSlots(res.sessionId)).toEqual({ lastNetworkFilter: 'HBO', preferredNetworks: ['HBO'] });
  });

  it('ranks recommendations by how many preferences they match', async () => {
    const { orchestrator } = build(
      scriptedLlm([intentJson('RECOMMEND_BY_PREFERENCE', { genre: 'Fantasy', network: 'Netflix' })]),
    );

    const res = await orchestrator.handleMessage('fantasy on netflix');
    const lines = res.replyText.split('\n');

    expect(lines[0]).toBe('Here are some Fantasy series on Netflix you might like:');
    expect(lines[1]).toBe('1. Stranger Things (2016, Netflix) — Drama, Fantasy, Science Fiction');
  });

  it('reuses the last genre filter and keeps the preference list free of duplicates', async () => {
    const catalog = new FakeCatalog();
    const { orchestrator, memory } = build(
      scriptedLlm([
        intentJson('RECOMMEND_BY_PREFERENCE', { genre: 'Crime' }),
        intentJson('RECOMMEND_BY_PREFERENCE'),
        intentJson('RECOMMEND_BY_PREFERENCE', { genre: 'crime' }),
      ]),
      catalog,
    );

    const first = await orchestrator.handleMessage('some crime shows');
    await orchestrator.handleMessage('more like that', first.sessionId);
    await orchestrator.handleMessage('crime again', first.sessionId);

    expect(catalog.calls.map((c) => c.arg)).toEqual(['Crime', 'Crime', 'crime']);
    expect(memory.getSlots(first.sessionId)).toEqual({
      lastGenreFilter: 'crime',
      favoriteGenres: ['Crime'],
    });
  });

  it('answers small talk through the model', async () => {
    const llm = scriptedLlm([intentJson('GENERAL_CHAT')], 'Hello there!');
    const { orchestrator } = build(llm);

    const res = await orchestrator.handleMessage('hi');

    expect(res.replyText).toBe('Hello there!');
    expect(llm.prompts[1]).toContain('Latest user message:\nhi');
  });

  it('falls back to a fixed reply when small talk generation fails', async () => {
    const llm = new ScriptedLlm((_prompt, opts) => {
      if (opts.responseFormat === 'json') return intentJson('GENERAL_CHAT');
      throw new Error('provider down');
    });
    const { orchestrator } = build(llm);

    const res = await orchestrator.handleMessage('thanks!');

    expect(res.replyText).toBe(CHAT_FALLBACK_REPLY);
  });

  it('applies the tie-break policy when several titles match', async () => {
    const series: SeriesDetail[] = [
      { id: '1', title: 'Doctor Who (2005)', genres: [] },
      { id: '2', title: 'Doctor Who', genres: [] },
    ];
    const exact = new FakeCatalog(series, {});
    const first = new FakeCatalog(series, {});

    const a = build(scriptedLlm([intentJson('GET_DETAILS', { title: 'doctor who' })]), exact);
    const b = build(scriptedLlm([intentJson('GET_DETAILS', { title: 'doctor who' })]), first, { tieBreak: 'first' });
    await a.orchestrator.handleMessage('tell me about doctor who');
    await b.orchestrator.handleMessage('tell me about doctor who');

    expect(exact.calls[1]).toEqual({ method: 'getSeries', arg: '2' });
    expect(first.calls[1]).toEqual({ method: 'getSeries', arg: '1' });
  });

  it('answers an empty message with help and records nothing', async () => {
    const llm = scriptedLlm([]);
    const { orchestrator, memory } = build(llm);

    const res = await orchestrator.handleMessage('   ');

    expect(res.replyText).toBe(HELP_REPLY);
    expect(memory.getHistory(res.sessionId, 10)).toEqual([]);
    expect(llm.prompts).toHaveLength(0);
  });

  it('starts a new session for an unknown id', async () => {
    const { orchestrator, memory } = build(scriptedLlm([intentJson('GENERAL_CHAT')]));

    const res = await orchestrator.handleMessage('hi', 'no-such-session');

    expect(res.sessionId).not.toBe('no-such-session');
    expect(res.sessionId).toMatch(/^session_\d+_[0-9a-f]{8}$/);
    expect(memory.has(res.sessionId)).toBe(true);
  });

  it('serializes concurrent turns of one session in arrival order', async () => {
    let calls = 0;
    const llm = new ScriptedLlm(async () => {
      const n = ++calls;
      if (n === 1) await new Promise((resolve) => setTimeout(resolve, 30));
      return intentJson('SEARCH_BY_TITLE', { title: n === 1 ? 'Dark' : 'The Wire' });
    });
    const { orchestrator, memory } = build(llm);
    const id = memory.create();

    const [a, b] = await Promise.all([
      orchestrator.handleMessage('first', id),
      orchestrator.handleMessage('second', id),
    ]);

    expect(transcript(memory, id)).toEqual([
      'user:first',
      `assistant:${a.replyText}`,
      'user:second',
      `assistant:${b.replyText}`,
    ]);
    expect(a.replyText.split('\n')[0]).toBe('I found 1 series matching "Dark":');
    expect(b.replyText.split('\n')[0]).toBe('I found 1 series matching "The Wire":');
    expect(memory.getSlots(id).lastSeriesTitle).toBe('The Wire');
  });

  it('clears a session on request', async () => {
    const { orchestrator, memory } = build(scriptedLlm([intentJson('GENERAL_CHAT')]));
    const res = await orchestrator.handleMessage('hi');

    expect(orchestrator.endSession(res.sessionId)).toBe(true);
    expect(memory.has(res.sessionId)).toBe(false);
    expect(orchestrator.endSession(res.sessionId)).toBe(false);
  });
});
