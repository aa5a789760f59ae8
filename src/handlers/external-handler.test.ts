import { expect } from 'chai';
import sinon from 'sinon';
import { CallbackError, CancellationError } from '../errors.js';
import { createSilentLogger } from '../testUtils/logTransports.js';
import { expectRejection } from '../testUtils/testHelpers.js';
import { ExternalAuthorizationHandler } from './external-handler.js';

describe('ExternalAuthorizationHandler', () => {
  let onAuthorizationUrl: sinon.SinonStub<[string], void>;
  let handler: ExternalAuthorizationHandler;

  beforeEach(() => {
    onAuthorizationUrl = sinon.stub<[string], void>();
    handler = new ExternalAuthorizationHandler({
      onAuthorizationUrl,
      logger: createSilentLogger(),
    });
  });

  it('hands the URL to the host', async () => {
    await handler.present('https://auth.example.com/authorize?state=s1');

    expect(
      onAuthorizationUrl.calledOnceWithExactly(
        'https://auth.example.com/authorize?state=s1'
      )
    ).to.be.true;
  });

  it('resolves a waiting collect when the host delivers', async () => {
    await handler.present('https://auth.example.com/authorize');
    const collecting = handler.collect();
    expect(handler.isWaiting).to.be.true;

    expect(handler.deliver('abc123', 's1')).to.be.true;

    expect(await collecting).to.deep.equal({ code: 'abc123', state: 's1' });
    expect(handler.isWaiting).to.be.false;
  });

  it('keeps a result delivered before collect', async () => {
    await handler.present('https://auth.example.com/authorize');
    handler.deliverRedirect('/callback?code=abc123&state=s1');

    expect(await handler.collect()).to.deep.equal({
      code: 'abc123',
      state: 's1',
    });
  });

  it('accepts one result per attempt', async () => {
    await handler.present('https://auth.example.com/authorize');

    expect(handler.deliver('abc123')).to.be.true;
    expect(handler.deliver('replayed')).to.be.false;
    expect(await handler.collect()).to.deep.equal({ code: 'abc123' });
  });

  it('accepts a new result after the next present', async () => {
    await handler.present('https://auth.example.com/authorize');
    handler.deliver('first');
    await handler.collect();

    await handler.present('https://auth.example.com/authorize');
    handler.deliver('second');

    expect(await handler.collect()).to.deep.equal({ code: 'second' });
  });

  it('rejects with CancellationError on fail', async () => {
    await handler.present('https://auth.example.com/authorize');
    const collecting = handler.collect();

    handler.fail('access_denied', 'User declined');

    const error = await expectRejection(collecting, CancellationError);
    expect(error.message).to.equal(
      'Authorization cancelled: access_denied (User declined)'
    );
  });

  it('rejects a redirect without a code', async () => {
    await handler.present('https://auth.example.com/authorize');
    const collecting = handler.collect();

    handler.deliverRedirect('https://app.example.com/callback?state=s1');

    const error = await expectRejection(collecting, CallbackError);
    expect(error.reason).to.equal('missing_code');
  });

  it('rejects a redirect URL that cannot be parsed', async () => {
    await handler.present('https://auth.example.com/authorize');
    const collecting = handler.collect();

    expect(handler.deliverRedirect('http://[bad')).to.be.true;

    const error = await expectRejection(collecting, CallbackError);
    expect(error.reason).to.equal('invalid_redirect');
    expect(error.cause).to.be.instanceOf(TypeError);
  });

  it('rejects when the caller aborts', async () => {
    const controller = new AbortController();
    const collecting = handler.collect({ signal: controller.signal });

    controller.abort();

    await expectRejection(collecting, CancellationError);
    expect(handler.isWaiting).to.be.false;
  });
});
