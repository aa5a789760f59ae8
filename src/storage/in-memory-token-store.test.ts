import { expect } from 'chai';
import { credentials, freshTokenSet } from '../fixtures/test-data.js';
import { InMemoryTokenStore } from './in-memory-token-store.js';

describe('InMemoryTokenStore', () => {
  it('starts empty', async () => {
    const store = new InMemoryTokenStore();

    expect(await store.getClientCredentials()).to.be.undefined;
    expect(await store.getTokens()).to.be.undefined;
  });

  it('returns pre-seeded credentials and tokens', async () => {
    const tokens = freshTokenSet(1_000);
    const store = new InMemoryTokenStore({
      clientCredentials: credentials.confidential,
      tokens,
    });

    expect(await store.getClientCredentials()).to.deep.equal(
      credentials.confidential
    );
    expect(await store.getTokens()).to.deep.equal(tokens);
  });

  it('hands out copies that cannot change stored values', async () => {
    const store = new InMemoryTokenStore({ tokens: freshTokenSet(1_000) });

    const copy = await store.getTokens();
    if (copy) copy.accessToken = 'tampered';

    expect((await store.getTokens())?.accessToken).to.equal('cached-token');
  });

  it('copies values on write', async () => {
    const store = new InMemoryTokenStore();
    const written = { client_id: 'test-client-id', redirect_uris: ['http://localhost:3030/callback'] };

    await store.setClientCredentials(written);
    written.redirect_uris.push('http://evil.example.com/');

    expect((await store.getClientCredentials())?.redirect_uris).to.deep.equal([
      'http://localhost:3030/callback',
    ]);
  });

  it('drops tokens when set to undefined', async () => {
    const store = new InMemoryTokenStore({ tokens: freshTokenSet(1_000) });

    await store.setTokens(undefined);

    expect(await store.getTokens()).to.be.undefined;
  });

  it('runs exclusive sections one at a time in call order', async () => {
    const store = new InMemoryTokenStore();
    const events: string[] = [];

    const section = (name: string, delayMs: number) =>
      store.runExclusive(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a', 20), section('b', 0)]);

    expect(results).to.deep.equal(['a', 'b']);
    expect(events).to.deep.equal(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('keeps the lock usable after a failing section', async () => {
    const store = new InMemoryTokenStore();

    const failing = store.runExclusive(async () => {
      throw new Error('boom');
    });
    const next = store.runExclusive(async () => 'ok');

    await failing.then(
      () => expect.fail('expected rejection'),
      (error: unknown) => expect(error).to.be.instanceOf(Error)
    );
    expect(await next).to.equal('ok');
  });
});
