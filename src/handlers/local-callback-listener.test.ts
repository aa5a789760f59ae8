import { expect } from 'chai';
import sinon from 'sinon';
import { createServer } from 'node:net';
import {
  CancellationError,
  ConfigurationError,
  TimeoutError,
} from '../errors.js';
import {
  createRecordingLogger,
  createSilentLogger,
} from '../testUtils/logTransports.js';
import {
  closeServer,
  expectRejection,
  listenOnLoopback,
  sendCallback,
} from '../testUtils/testHelpers.js';
import { LocalCallbackListener } from './local-callback-listener.js';

const AUTHORIZATION_URL = 'https://auth.example.com/authorize?state=xyz';

describe('LocalCallbackListener', () => {
  let listener: LocalCallbackListener;
  let printUrl: sinon.SinonSpy<[string], void>;

  beforeEach(() => {
    printUrl = sinon.spy<(url: string) => void>(() => undefined);
    listener = new LocalCallbackListener({
      port: 0,
      host: '127.0.0.1',
      openBrowser: false,
      printUrl,
      logger: createSilentLogger(),
    });
  });

  afterEach(async () => {
    await listener.close();
    sinon.restore();
  });

  it('binds on present and prints the authorization URL', async () => {
    await listener.present(AUTHORIZATION_URL);

    expect(listener.isListening).to.be.true;
    expect(listener.port).to.be.greaterThan(0);
    expect(printUrl.calledOnceWithExactly(AUTHORIZATION_URL)).to.be.true;
  });

  it('resolves with code and state and releases the port', async () => {
    await listener.present(AUTHORIZATION_URL);
    const port = listener.port;
    const collecting = listener.collect();

    const response = await sendCallback(
      `http://127.0.0.1:${port}/callback?code=abc123&state=xyz`
    );

    expect(response.status).to.equal(200);
    expect(await collecting).to.deep.equal({ code: 'abc123', state: 'xyz' });
    expect(listener.isListening).to.be.false;

    const probe = createServer();
    expect(await listenOnLoopback(probe, port)).to.equal(port);
    await closeServer(probe);
  });

  it('keeps a callback that arrives before collect is called', async () => {
    await listener.present(AUTHORIZATION_URL);
    await sendCallback(`http://127.0.0.1:${listener.port}/callback?code=early`);

    expect(await listener.collect()).to.deep.equal({ code: 'early' });
  });

  it('rejects with CancellationError when the server reports an error', async () => {
    await listener.present(AUTHORIZATION_URL);
    const collecting = listener.collect();

    const response = await sendCallback(
      `http://127.0.0.1:${listener.port}/callback?error=access_denied`
    );

    expect(response.status).to.equal(400);
    const error = await expectRejection(collecting, CancellationError);
    expect(error.error).to.equal('access_denied');
    expect(listener.isListening).to.be.false;
  });

  it('times out and tears the listener down', async () => {
    listener = new LocalCallbackListener({
      port: 0,
      host: '127.0.0.1',
      timeoutMs: 50,
      openBrowser: false,
      printUrl,
      logger: createSilentLogger(),
    });

    const error = await expectRejection(listener.collect(), TimeoutError);

    expect(error.timeoutMs).to.equal(50);
    expect(error.message).to.equal('No authorization callback received within 50ms');
    expect(listener.isListening).to.be.false;
  });

  it('stops waiting when the caller aborts', async () => {
    const controller = new AbortController();
    const collecting = listener.collect({ signal: controller.signal });
    await new Promise((resolve) => setImmediate(resolve));

    controller.abort();

    const error = await expectRejection(collecting, CancellationError);
    expect(error.error).to.equal('aborted');
    expect(listener.isListening).to.be.false;
  });

  it('propagates a library error used as the abort reason', async () => {
    const controller = new AbortController();
    const collecting = listener.collect({ signal: controller.signal });
    const reason = new TimeoutError('Authorization timed out after 2000ms', 2000);

    controller.abort(reason);

    expect(await expectRejection(collecting, TimeoutError)).to.equal(reason);
  });

  it('reports a busy port as a ConfigurationError', async () => {
    const blocker = createServer();
    const port = await listenOnLoopback(blocker);
    listener = new LocalCallbackListener({
      port,
      host: '127.0.0.1',
      openBrowser: false,
      printUrl,
      logger: createSilentLogger(),
    });

    try {
      const error = await expectRejection(
        listener.present(AUTHORIZATION_URL),
        ConfigurationError
      );
      expect(error.message).to.equal(
        `Cannot listen on 127.0.0.1:${port} (EADDRINUSE)`
      );
      expect(listener.isListening).to.be.false;
    } finally {
      await closeServer(blocker);
    }
  });

  it('logs a warning when the browser cannot be opened', async () => {
    const { logger, transport } = createRecordingLogger();
    const browserLauncher = sinon.stub<[string], Promise<boolean>>().resolves(false);
    listener = new LocalCallbackListener({
      port: 0,
      host: '127.0.0.1',
      printUrl,
      browserLauncher,
      logger,
    });

    await listener.present(AUTHORIZATION_URL);

    expect(browserLauncher.calledOnceWithExactly(AUTHORIZATION_URL)).to.be.true;
    expect(transport.messages()).to.include(
      'Could not open a browser; open the authorization URL manually'
    );
  });

  it('can be bound again for a later attempt', async () => {
    await listener.present(AUTHORIZATION_URL);
    const first = listener.collect();
    await sendCallback(`http://127.0.0.1:${listener.port}/callback?code=one`);
    await first;

    await listener.present(AUTHORIZATION_URL);
    const second = listener.collect();
    await sendCallback(`http://127.0.0.1:${listener.port}/callback?code=two`);

    expect(await second).to.deep.equal({ code: 'two' });
  });

  it('cancels a bind still in progress when closed', async () => {
    const presenting = listener.present(AUTHORIZATION_URL);
    const closing = listener.close();

    const error = await expectRejection(presenting, CancellationError);
    expect(error.errorDescription).to.equal('Callback listener closed');
    await closing;
    await listener.close();
    expect(listener.isListening).to.be.false;
    expect(printUrl.called).to.be.false;
  });

  describe('shared callback port', () => {
    let port: number;
    let others: LocalCallbackListener[];

    const onSharedPort = (): LocalCallbackListener => {
      const created = new LocalCallbackListener({
        port,
        host: '127.0.0.1',
        openBrowser: false,
        printUrl,
        logger: createSilentLogger(),
      });
      others.push(created);
      return created;
    };

    beforeEach(async () => {
      const finder = createServer();
      port = await listenOnLoopback(finder);
      await closeServer(finder);
      others = [];
    });

    afterEach(async () => {
      await Promise.all(others.map((other) => other.close()));
    });

    it('waits for the current holder to close before binding', async () => {
      const first = onSharedPort();
      const second = onSharedPort();
      await first.present(AUTHORIZATION_URL);

      let secondReady = false;
      const presenting = second.present(AUTHORIZATION_URL).then(() => {
        secondReady = true;
      });
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(secondReady).to.be.false;

      await first.close();
      await presenting;

      expect(second.isListening).to.be.true;
      expect(second.port).to.equal(port);
    });

    it('gives up its place in line when closed while waiting', async () => {
      const first = onSharedPort();
      const second = onSharedPort();
      await first.present(AUTHORIZATION_URL);

      const presenting = second.present(AUTHORIZATION_URL);
      await new Promise((resolve) => setImmediate(resolve));
      await second.close();

      await expectRejection(presenting, CancellationError);
      expect(first.isListening).to.be.true;

      await first.close();
      const third = onSharedPort();
      await third.present(AUTHORIZATION_URL);
      expect(third.isListening).to.be.true;
    });

    it('stops waiting when the caller aborts', async () => {
      const first = onSharedPort();
      const second = onSharedPort();
      await first.present(AUTHORIZATION_URL);
      const controller = new AbortController();

      const presenting = second.present(AUTHORIZATION_URL, {
        signal: controller.signal,
      });
      controller.abort();

      const error = await expectRejection(presenting, CancellationError);
      expect(error.error).to.equal('aborted');
      expect(second.isListening).to.be.false;
      expect(first.isListening).to.be.true;
    });
  });

  describe('fromRedirectUri', () => {
    it('derives host, port and path', () => {
      const derived = LocalCallbackListener.fromRedirectUri(
        'http://localhost:3030/oauth/callback',
        { logger: createSilentLogger() }
      );

      expect(derived.host).to.equal('localhost');
      expect(derived.port).to.equal(3030);
      expect(derived.path).to.equal('/oauth/callback');
    });

    it('unwraps IPv6 literals', () => {
      const derived = LocalCallbackListener.fromRedirectUri(
        'http://[::1]:8765/callback',
        { logger: createSilentLogger() }
      );

      expect(derived.host).to.equal('::1');
      expect(derived.port).to.equal(8765);
    });

    it('refuses non-http redirect URIs', () => {
      expect(() =>
        LocalCallbackListener.fromRedirectUri('https://app.example.com/callback')
      ).to.throw(ConfigurationError);
    });
  });
});
