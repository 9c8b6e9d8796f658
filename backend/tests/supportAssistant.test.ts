import fs from 'fs/promises';
import OpenAI from 'openai';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config';
import { AppServices, createServices } from '../src/services';
import { CredentialStore } from '../src/utils/credentialStore';
import { InvalidSession, QueryFailed, ValidationError } from '../src/utils/errors';
import { NO_SOURCE_NOTICE } from '../src/utils/promptAssembler';
import { citedSources } from '../src/utils/supportAssistant';
import {
  FakeProvider,
  HANDBOOK_TEXT,
  SECURITY_TEXT,
  ScriptedProvider,
  makeDocument,
  makeTempDir,
  testRegistry,
  writeDocuments
} from './helpers/fixtures';

const PTO_QUERY = 'How many PTO days do I get?';
const PTO_ANSWER = 'Full-time employees receive 20 PTO days per year according to the Employee Handbook.';

describe('citedSources', () => {
  it('cites a document whose name the answer mentions', () => {
    const handbook = makeDocument('employee_handbook', HANDBOOK_TEXT);
    const sources = citedSources(PTO_ANSWER, [{ documentName: 'employee_handbook', score: 3, matchedTerms: ['pto'], document: handbook }], ['pto', 'days']);

    expect(sources).toEqual([{
      document: 'employee_handbook',
      displayName: 'Employee Handbook',
      highlight: 'Full-time employees receive 20 PTO days per calendar year.\nUnused PTO carries over up to 5 days.'
    }]);
  });

  it('cites a document when most words of an opening sentence appear', () => {
    const plan = makeDocument('plan_b', 'Dental cleanings are covered twice every calendar year. Orthodontics requires approval.');
    const sources = citedSources(
      'Your dental cleanings are covered twice per calendar year.',
      [{ documentName: 'plan_b', score: 1, matchedTerms: ['dental'], document: plan }],
      ['dental']
    );
    expect(sources.map(s => s.document)).toEqual(['plan_b']);
  });

  it('skips documents the answer does not draw on', () => {
    const security = makeDocument('it_security_policy', SECURITY_TEXT);
    expect(citedSources('Talk to your manager.', [{ documentName: 'it_security_policy', score: 1, matchedTerms: [], document: security }], [])).toEqual([]);
  });

  it('falls back to the opening text when no line has a keyword', () => {
    const notes = makeDocument('long_notes', 'a'.repeat(300));
    const [source] = citedSources('See the long notes.', [{ documentName: 'long_notes', score: 1, matchedTerms: [], document: notes }], ['zzz']);
    expect(source.highlight).toBe('a'.repeat(200));
  });

  it('adds an ellipsis when the keyword lines run past the limit', () => {
    const notes = makeDocument('long_notes', `zzz ${'b'.repeat(246)}`);
    const [source] = citedSources('See the long notes.', [{ documentName: 'long_notes', score: 1, matchedTerms: [], document: notes }], ['zzz']);
    expect(source.highlight).toBe(`zzz ${'b'.repeat(196)}...`);
  });
});

describe('SupportAssistant.ask', () => {
  let dir: string;
  let provider: FakeProvider;
  let services: AppServices;
  let token: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    dir = await makeTempDir();
    await writeDocuments(dir, {
      'employee_handbook.txt': HANDBOOK_TEXT,
      'it_security_policy.txt': SECURITY_TEXT
    });
    provider = new FakeProvider();
    services = await createServices(loadConfig({ DOCUMENTS_DIR: dir }), {
      credentials: CredentialStore.fromRegistry(testRegistry()),
      provider
    });
    token = services.sessions.create(services.credentials.lookup('jane.smith'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('answers from the matched documents and cites the ones used', async () => {
    provider.enqueue(PTO_ANSWER);
    const result = await services.assistant.ask(token, PTO_QUERY);

    expect(result.query).toBe(PTO_QUERY);
    expect(result.answer).toBe(PTO_ANSWER);
    expect(result.sources.map(s => s.document)).toEqual(['employee_handbook']);
    expect(result.droppedTurns).toBe(0);
    expect(result.droppedDocuments).toBe(0);

    const [messages] = provider.calls;
    expect(messages[0].content).toContain(`Document_1 - employee_handbook:\n${HANDBOOK_TEXT}`);
    expect(messages[0].content).toContain('Document_2 - it_security_policy:');
    expect(messages[messages.length - 1]).toEqual({ role: 'user', content: PTO_QUERY });
  });

  it('records the interaction and extends the transcript', async () => {
    provider.enqueue(PTO_ANSWER);
    await services.assistant.ask(token, PTO_QUERY);

    const [record] = services.analytics.all();
    expect(record).toMatchObject({
      userId: 'jane.smith',
      department: 'Human Resources',
      query: PTO_QUERY,
      responseLength: PTO_ANSWER.length,
      documentsUsed: ['employee_handbook'],
      queryType: 'PTO & Leave',
      status: 'success'
    });
    expect(services.sessions.resolve(token).transcript.map(t => [t.speaker, t.text])).toEqual([
      ['user', PTO_QUERY],
      ['assistant', PTO_ANSWER]
    ]);
  });

  it('trims the query', async () => {
    const result = await services.assistant.ask(token, `   ${PTO_QUERY}  `);
    expect(result.query).toBe(PTO_QUERY);
  });

  it('sends earlier turns with the next question', async () => {
    provider.enqueue(PTO_ANSWER, 'Yes, up to 5 days.');
    await services.assistant.ask(token, PTO_QUERY);
    await services.assistant.ask(token, 'Do unused days carry over?');

    const second = provider.calls[1];
    expect(second.slice(1)).toEqual([
      { role: 'user', content: PTO_QUERY },
      { role: 'assistant', content: PTO_ANSWER },
      { role: 'user', content: 'Do unused days carry over?' }
    ]);
  });

  it('handles concurrent questions in one session in order', async () => {
    provider.enqueue('first answer', 'second answer');
    await Promise.all([
      services.assistant.ask(token, 'first question about pto'),
      services.assistant.ask(token, 'second question about pto')
    ]);

    expect(provider.calls[1].map(m => m.content).slice(1)).toEqual([
      'first question about pto',
      'first answer',
      'second question about pto'
    ]);
    expect(services.sessions.resolve(token).transcript).toHaveLength(4);
  });

  it('tells the model when no document matched', async () => {
    const result = await services.assistant.ask(token, 'quarterly revenue forecast');

    expect(provider.calls[0][0].content).toContain(NO_SOURCE_NOTICE);
    expect(result.answer).toBe('Please check with HR.');
    expect(result.sources).toEqual([]);
  });

  it('sees documents added after startup', async () => {
    await writeDocuments(dir, { 'parking_policy.txt': 'Parking permits are issued by facilities.' });
    await services.assistant.ask(token, 'Where do I get parking permits?');

    expect(provider.calls[0][0].content).toContain('Document_1 - parking_policy:\nParking permits are issued by facilities.');
  });

  it('rejects an unknown session without recording anything', async () => {
    await expect(services.assistant.ask('not-a-session', PTO_QUERY)).rejects.toBeInstanceOf(InvalidSession);
    expect(services.analytics.size).toBe(0);
    expect(provider.calls).toHaveLength(0);
  });

  it('rejects an empty query', async () => {
    await expect(services.assistant.ask(token, '   ')).rejects.toBeInstanceOf(ValidationError);
    expect(provider.calls).toHaveLength(0);
  });

  it('reports a timeout with the query and records the failure', async () => {
    provider.enqueue(new OpenAI.APIConnectionTimeoutError());

    const error = await services.assistant.ask(token, PTO_QUERY).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(QueryFailed);
    if (!(error instanceof QueryFailed)) return;
    expect(error.query).toBe(PTO_QUERY);
    expect(error.kind).toBe('Timeout');
    expect(error.status).toBe(502);

    expect(services.analytics.aggregate().errorCount).toBe(1);
    expect(services.analytics.all()[0]).toMatchObject({
      status: 'error',
      errorKind: 'Timeout',
      responseLength: 0,
      documentsUsed: []
    });
    expect(services.sessions.resolve(token).transcript).toEqual([]);
  });

  it('reports rate limiting as 503', async () => {
    provider.enqueue(new OpenAI.RateLimitError(429, undefined, 'Rate limit reached', undefined));
    const error = await services.assistant.ask(token, PTO_QUERY).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(QueryFailed);
    expect(error instanceof QueryFailed && error.status).toBe(503);
  });
});

describe('SupportAssistant with a query in flight', () => {
  let dir: string;
  let time: number;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    dir = await makeTempDir();
    await writeDocuments(dir, { 'employee_handbook.txt': HANDBOOK_TEXT });
    time = Date.parse('2026-03-02T09:00:00.000Z');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function servicesWith(provider: ScriptedProvider): Promise<AppServices> {
    return createServices(loadConfig({ DOCUMENTS_DIR: dir, SESSION_IDLE_MINUTES: '60' }), {
      credentials: CredentialStore.fromRegistry(testRegistry()),
      provider,
      now: () => time
    });
  }

  it('keeps the answer when the session goes idle during the model call', async () => {
    const services = await servicesWith(new ScriptedProvider(async () => {
      time += 61 * 60 * 1000;
      return PTO_ANSWER;
    }));
    const token = services.sessions.create(services.credentials.lookup('jane.smith'));

    const result = await services.assistant.ask(token, PTO_QUERY);
    expect(result.answer).toBe(PTO_ANSWER);
    expect(services.analytics.all().map(r => r.status)).toEqual(['success']);
    expect(() => services.sessions.resolve(token)).toThrow('Session has expired');
  });

  it('returns the answer when the user logs out during the model call', async () => {
    let token = '';
    const services: AppServices = await servicesWith(new ScriptedProvider(async () => {
      services.sessions.destroy(token);
      return PTO_ANSWER;
    }));
    token = services.sessions.create(services.credentials.lookup('jane.smith'));

    await expect(services.assistant.ask(token, PTO_QUERY)).resolves.toMatchObject({ answer: PTO_ANSWER });
    expect(services.analytics.size).toBe(1);
  });

  it('applies a reset after the query in flight has finished', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const services = await servicesWith(new ScriptedProvider(async () => {
      await gate;
      return PTO_ANSWER;
    }));
    const token = services.sessions.create(services.credentials.lookup('jane.smith'));

    const asking = services.assistant.ask(token, PTO_QUERY);
    const resetting = services.assistant.reset(token);
    release();
    const [result] = await Promise.all([asking, resetting]);

    expect(result.answer).toBe(PTO_ANSWER);
    expect(services.sessions.resolve(token).transcript).toEqual([]);
  });

  it('rejects a reset without a session', async () => {
    const services = await servicesWith(new ScriptedProvider(async () => PTO_ANSWER));
    await expect(services.assistant.reset(undefined)).rejects.toBeInstanceOf(InvalidSession);
  });
});
