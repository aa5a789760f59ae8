import { expect } from 'chai';
import sinon from 'sinon';
import { BearerAuthProvider } from '../auth/static-providers.js';
import {
  ConfigurationError,
  MultiServerConnectionError,
  NetworkError,
  TimeoutError,
} from '../errors.js';
import { createRecordingLogger, createSilentLogger } from '../testUtils/logTransports.js';
import { expectInstance, expectRejection } from '../testUtils/testHelpers.js';
import type { AuthProvider } from '../types.js';
import { sleep } from '../utils/deadline.js';
import { MultiServerAuthBinder } from './multi-server-auth-binder.js';
import type { ConnectContext, EndpointDescriptor } from './types.js';

class FakeConnection {
  closeCount = 0;

  constructor(readonly endpoint: string) {}

  async close(): Promise<void> {
    this.closeCount++;
  }
}

const alpha: EndpointDescriptor = { name: 'alpha', url: 'https://alpha.example.com/mcp' };
const beta: EndpointDescriptor = { name: 'beta', url: 'https://beta.example.com/mcp' };

describe('MultiServerAuthBinder', () => {
  let opened: FakeConnection[];
  let contexts: Map<string, ConnectContext>;
  let failing: Set<string>;

  const connector = async (
    endpoint: EndpointDescriptor,
    context: ConnectContext
  ): Promise<FakeConnection> => {
    contexts.set(endpoint.name, context);
    if (failing.has(endpoint.name)) {
      throw new NetworkError('connection refused');
    }
    const connection = new FakeConnection(endpoint.name);
    opened.push(connection);
    return connection;
  };

  beforeEach(() => {
    opened = [];
    contexts = new Map();
    failing = new Set();
  });

  describe('construction', () => {
    it('requires one auth provider entry per endpoint', () => {
      expect(
        () => new MultiServerAuthBinder([alpha, beta], [undefined], connector)
      ).to.throw(ConfigurationError, 'Expected 2 auth provider entries, got 1');
    });

    it('rejects duplicate endpoint names', () => {
      expect(
        () =>
          new MultiServerAuthBinder(
            [alpha, { ...beta, name: 'alpha' }],
            [undefined, undefined],
            connector
          )
      ).to.throw(ConfigurationError, 'Duplicate endpoint name: alpha');
    });
  });

  describe('connectAll', () => {
    it('connects every endpoint with its own headers', async () => {
      const binder = new MultiServerAuthBinder(
        [alpha, beta],
        [new BearerAuthProvider('test-token'), null],
        connector,
        { logger: createSilentLogger() }
      );

      const connections = await binder.connectAll();

      expect([...connections.keys()]).to.deep.equal(['alpha', 'beta']);
      expect(contexts.get('alpha')?.headers).to.deep.equal({
        Authorization: 'Bearer test-token',
      });
      expect(contexts.get('beta')?.headers).to.deep.equal({});
      expect(contexts.get('beta')?.authProvider).to.be.undefined;
      expect(binder.failedConnections).to.be.empty;
    });

    it('fails fast and closes what was opened', async () => {
      failing.add('beta');
      const binder = new MultiServerAuthBinder([alpha, beta], [undefined, undefined], connector, {
        logger: createSilentLogger(),
      });

      const error = await expectRejection(binder.connectAll(), MultiServerConnectionError);

      expect(error.message).to.equal('Failed to connect 1 endpoint(s): beta (connection refused)');
      expect(error.failures.map((failure) => failure.endpoint)).to.deep.equal(['beta']);
      expect(opened[0].closeCount).to.equal(1);
      expect(binder.connections.size).to.equal(0);
      expect(binder.failedConnections).to.have.length(1);
    });

    it('lists every failed endpoint', async () => {
      failing.add('alpha');
      failing.add('beta');
      const binder = new MultiServerAuthBinder([alpha, beta], [undefined, undefined], connector, {
        logger: createSilentLogger(),
      });

      const error = await expectRejection(binder.connectAll(), MultiServerConnectionError);

      expect(error.errors).to.have.length(2);
      expect(error.message).to.equal(
        'Failed to connect 2 endpoint(s): alpha (connection refused), beta (connection refused)'
      );
    });

    it('records failures when isolating them', async () => {
      failing.add('beta');
      const onConnectionError = sinon.spy();
      const binder = new MultiServerAuthBinder([alpha, beta], [undefined, undefined], connector, {
        isolateFailures: true,
        onConnectionError,
        logger: createSilentLogger(),
      });

      const connections = await binder.connectAll();

      expect([...connections.keys()]).to.deep.equal(['alpha']);
      expect(binder.failedConnections.map((failure) => failure.endpoint)).to.deep.equal([beta]);
      expect(onConnectionError.calledOnce).to.be.true;
      expect(onConnectionError.firstCall.args[0]).to.equal(beta);
      expect(expectInstance(onConnectionError.firstCall.args[1], NetworkError).message).to.equal(
        'connection refused'
      );
    });

    it('tolerates failures of optional endpoints', async () => {
      failing.add('beta');
      const { logger, transport } = createRecordingLogger();
      const binder = new MultiServerAuthBinder(
        [alpha, { ...beta, optional: true }],
        [undefined, undefined],
        connector,
        { logger }
      );

      const connections = await binder.connectAll();

      expect(connections.has('alpha')).to.be.true;
      expect(transport.messages()).to.include('Endpoint unavailable; continuing without it');
    });

    it('keeps going when onConnectionError throws', async () => {
      failing.add('beta');
      const binder = new MultiServerAuthBinder([alpha, beta], [undefined, undefined], connector, {
        isolateFailures: true,
        onConnectionError: () => {
          throw new Error('callback failure');
        },
        logger: createSilentLogger(),
      });

      expect((await binder.connectAll()).size).to.equal(1);
    });

    it('treats an authentication failure as an endpoint failure', async () => {
      const rejecting: AuthProvider = {
        getAuthHeaders: () => Promise.reject(new NetworkError('token endpoint unreachable')),
      };
      const binder = new MultiServerAuthBinder([alpha, beta], [rejecting, undefined], connector, {
        isolateFailures: true,
        logger: createSilentLogger(),
      });

      await binder.connectAll();

      expect(contexts.has('alpha')).to.be.false;
      expect(binder.failedConnections[0].error.message).to.equal('token endpoint unreachable');
    });

    it('connects other endpoints while an authorization is still pending', async () => {
      let finishAuthorization: (headers: Record<string, string>) => void = () => undefined;
      const pending: AuthProvider = {
        getAuthHeaders: () =>
          new Promise((resolve) => {
            finishAuthorization = resolve;
          }),
      };
      const binder = new MultiServerAuthBinder(
        [alpha, beta],
        [pending, new BearerAuthProvider('test-token')],
        connector,
        { logger: createSilentLogger() }
      );

      const connecting = binder.connectAll();
      await sleep(10);

      expect(contexts.get('beta')?.headers).to.deep.equal({
        Authorization: 'Bearer test-token',
      });
      expect(contexts.has('alpha')).to.be.false;

      finishAuthorization({ Authorization: 'Bearer tok1' });
      const connections = await connecting;

      expect([...connections.keys()]).to.deep.equal(['alpha', 'beta']);
    });

    it('does not let a slow authorization use up another endpoint\'s deadline', async () => {
      const slow: AuthProvider = {
        getAuthHeaders: () => sleep(100).then(() => ({})),
      };
      const binder = new MultiServerAuthBinder([alpha, beta], [slow, undefined], connector, {
        connectTimeoutMs: 50,
        isolateFailures: true,
        logger: createSilentLogger(),
      });

      const connections = await binder.connectAll();

      expect([...connections.keys()]).to.deep.equal(['beta']);
      expect(binder.failedConnections.map((failure) => failure.error.message)).to.deep.equal([
        'connect timed out after 50ms',
      ]);
    });

    it('refuses to connect twice without closing', async () => {
      const binder = new MultiServerAuthBinder([alpha], [undefined], connector, {
        logger: createSilentLogger(),
      });
      await binder.connectAll();

      await expectRejection(binder.connectAll(), ConfigurationError);
    });
  });

  describe('connect timeout', () => {
    it('fails endpoints that do not connect in time', async () => {
      const hanging = (_endpoint: EndpointDescriptor, context: ConnectContext) =>
        new Promise<FakeConnection>((_resolve, reject) => {
          context.signal.addEventListener('abort', () => reject(context.signal.reason));
        });
      const binder = new MultiServerAuthBinder([alpha], [undefined], hanging, {
        connectTimeoutMs: 20,
        isolateFailures: true,
        logger: createSilentLogger(),
      });

      await binder.connectAll();

      const error = expectInstance(binder.failedConnections[0].error, TimeoutError);
      expect(error.message).to.equal('connect timed out after 20ms');
      expect(error.endpoint).to.equal('https://alpha.example.com/mcp');
    });

    it('closes a connection that arrives after the deadline', async () => {
      const late = new FakeConnection('alpha');
      const slow = async (): Promise<FakeConnection> => {
        await sleep(40);
        return late;
      };
      const binder = new MultiServerAuthBinder([alpha], [undefined], slow, {
        connectTimeoutMs: 10,
        isolateFailures: true,
        logger: createSilentLogger(),
      });

      await binder.connectAll();
      await sleep(60);

      expect(binder.connections.size).to.equal(0);
      expect(late.closeCount).to.equal(1);
    });
  });

  describe('closeAll', () => {
    it('closes every connection and forgets it', async () => {
      const binder = new MultiServerAuthBinder([alpha, beta], [undefined, undefined], connector, {
        logger: createSilentLogger(),
      });
      await binder.connectAll();

      await binder.closeAll();

      expect(opened.map((connection) => connection.closeCount)).to.deep.equal([1, 1]);
      expect(binder.connections.size).to.equal(0);
    });

    it('logs close failures instead of throwing', async () => {
      const { logger, transport } = createRecordingLogger();
      const broken = {
        close: () => Promise.reject(new Error('already gone')),
      };
      const binder = new MultiServerAuthBinder([alpha], [undefined], async () => broken, {
        logger,
      });
      await binder.connectAll();

      await binder.closeAll();

      expect(transport.messages()).to.include('Closing connection failed');
    });
  });
});
