import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent } from 'undici';
import { PoliteHttpClient, type PoliteHttpClientOptions } from './http-client.js';
import { FetchError } from './errors.js';

const ORIGIN = 'https://www.hockeyslovakia.sk';
const LISTING_PATH = '/sk/articles/extraliga';
const LISTING_URL = `${ORIGIN}${LISTING_PATH}`;

describe('PoliteHttpClient', () => {
  let agent: MockAgent;
  let clock: { now: number; sleeps: number[] };

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    clock = { now: 0, sleeps: [] };
  });

  afterEach(async () => {
    await agent.close();
  });

  function createClient(overrides: Partial<PoliteHttpClientOptions> = {}): PoliteHttpClient {
    return new PoliteHttpClient({
      userAgent: 'test-agent/1.0',
      timeoutMs: 1000,
      delayMs: 0,
      dispatcher: agent,
      now: () => clock.now,
      sleep: async (ms) => {
        clock.sleeps.push(ms);
        clock.now += ms;
      },
      ...overrides,
    });
  }

  it('returns the page body and sends the configured identity', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: LISTING_PATH,
        method: 'GET',
        headers: { 'user-agent': 'test-agent/1.0', 'accept-language': 'sk-SK,sk;q=0.9,en;q=0.8' },
      })
      .reply(200, '<html>listing</html>');

    await expect(createClient().fetch(LISTING_URL)).resolves.toBe('<html>listing</html>');
  });

  it('retries transient failures with backoff', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: LISTING_PATH, method: 'GET' }).reply(503, 'busy');
    pool.intercept({ path: LISTING_PATH, method: 'GET' }).replyWithError(new Error('socket hang up'));
    pool.intercept({ path: LISTING_PATH, method: 'GET' }).reply(200, 'third time');

    await expect(createClient().fetch(LISTING_URL)).resolves.toBe('third time');
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('gives up after three attempts with a FetchError', async () => {
    const pool = agent.get(ORIGIN);
    for (let i = 0; i < 3; i++) {
      pool.intercept({ path: LISTING_PATH, method: 'GET' }).reply(500, 'error');
    }
    pool.intercept({ path: LISTING_PATH, method: 'GET' }).reply(200, 'never reached');

    const error = await createClient()
      .fetch(LISTING_URL)
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      url: LISTING_URL,
      status: 500,
      message: `HTTP 500 for ${LISTING_URL}`,
    });
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('wraps network errors', async () => {
    const pool = agent.get(ORIGIN);
    for (let i = 0; i < 3; i++) {
      pool.intercept({ path: LISTING_PATH, method: 'GET' }).replyWithError(new Error('ECONNRESET'));
    }

    const error = await createClient()
      .fetch(LISTING_URL)
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ url: LISTING_URL, status: null });
  });

  it('keeps the politeness gap between requests, retries included', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: LISTING_PATH, method: 'GET' }).reply(500, 'error');
    pool.intercept({ path: LISTING_PATH, method: 'GET' }).reply(200, 'first page');
    pool.intercept({ path: '/sk/articles/reprezentacia', method: 'GET' }).reply(200, 'second page');

    const client = createClient({ delayMs: 2500 });

    await expect(client.fetch(LISTING_URL)).resolves.toBe('first page');
    await expect(client.fetch(`${ORIGIN}/sk/articles/reprezentacia`)).resolves.toBe('second page');

    // backoff 1000, then the limiter tops the gap up to 2500; then a full gap
    expect(clock.sleeps).toEqual([1000, 1500, 2500]);
  });

  it('leaves an injected dispatcher open on close', async () => {
    agent.get(ORIGIN).intercept({ path: LISTING_PATH, method: 'GET' }).reply(200, 'still open');

    await createClient().close();

    await expect(createClient().fetch(LISTING_URL)).resolves.toBe('still open');
  });
});
