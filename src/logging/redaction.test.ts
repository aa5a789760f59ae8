import { expect } from 'chai';
import { redact, redactQueryParams } from './redaction.js';

describe('redact', () => {
  it('redacts top-level values', () => {
    const credentials = {
      client_id: 'test-client',
      client_secret: 'test-secret',
    };

    expect(redact(credentials, ['client_secret'])).to.eql({
      client_id: 'test-client',
      client_secret: '[redacted]',
    });
  });

  it('redacts nested values', () => {
    const meta = {
      stage: 'refresh',
      tokens: { accessToken: 'tok1', refreshToken: 'ref1', tokenType: 'Bearer' },
    };

    expect(redact(meta, ['tokens.accessToken', 'tokens.refreshToken'])).to.eql({
      stage: 'refresh',
      tokens: {
        accessToken: '[redacted]',
        refreshToken: '[redacted]',
        tokenType: 'Bearer',
      },
    });
  });

  it('redacts array elements by index', () => {
    const meta = { pair: ['verifier-value', 'challenge-value'] };

    expect(redact(meta, ['pair.0'])).to.eql({
      pair: ['[redacted]', 'challenge-value'],
    });
  });

  it('applies an index-free path to every element of an array', () => {
    const meta = {
      endpoints: [
        { name: 'docs', token: 'a' },
        { name: 'search', token: 'b' },
      ],
    };

    expect(redact(meta, ['endpoints.token'])).to.eql({
      endpoints: [
        { name: 'docs', token: '[redacted]' },
        { name: 'search', token: '[redacted]' },
      ],
    });
  });

  it('targets a single element when the path carries an index', () => {
    const meta = {
      endpoints: [
        { name: 'docs', token: 'a' },
        { name: 'search', token: 'b' },
      ],
    };

    expect(redact(meta, ['endpoints.1.token'])).to.eql({
      endpoints: [
        { name: 'docs', token: 'a' },
        { name: 'search', token: '[redacted]' },
      ],
    });
  });

  it('does not mutate its input', () => {
    const meta = { accessToken: 'tok1' };
    redact(meta, ['accessToken']);
    expect(meta.accessToken).to.equal('tok1');
  });

  it('returns primitives, null and undefined unchanged', () => {
    expect(redact(null, ['a'])).to.be.null;
    expect(redact(undefined, ['a'])).to.be.undefined;
    expect(redact('tok1', ['a'])).to.equal('tok1');
    expect(redact(42, ['a'])).to.equal(42);
  });

  it('ignores paths that do not exist', () => {
    expect(redact({ state: 'abc' }, ['code', 'tokens.accessToken'])).to.eql({
      state: 'abc',
    });
  });

  it('uses a custom placeholder', () => {
    expect(redact({ code: 'abc123' }, ['code'], '***')).to.eql({ code: '***' });
  });
});

describe('redactQueryParams', () => {
  it('redacts named parameters of an absolute URL', () => {
    expect(
      redactQueryParams('http://localhost:3030/callback?code=abc123&state=xyz', [
        'code',
      ])
    ).to.equal('http://localhost:3030/callback?code=%5Bredacted%5D&state=xyz');
  });

  it('keeps request paths relative', () => {
    expect(
      redactQueryParams('/callback?code=abc123&state=xyz', ['code', 'state'])
    ).to.equal('/callback?code=%5Bredacted%5D&state=%5Bredacted%5D');
  });

  it('leaves URLs without the parameters untouched', () => {
    expect(redactQueryParams('/callback?error=access_denied', ['code'])).to.equal(
      '/callback?error=access_denied'
    );
  });
});
