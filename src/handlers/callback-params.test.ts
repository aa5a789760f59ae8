import { expect } from 'chai';
import { CallbackError, CancellationError } from '../errors.js';
import { parseCallbackInput, parseCallbackParams } from './callback-params.js';
import { expectInstance } from '../testUtils/testHelpers.js';

describe('callback parameters', () => {
  describe('parseCallbackParams', () => {
    it('reads code and state', () => {
      expect(
        parseCallbackParams(new URLSearchParams('code=abc123&state=s1'))
      ).to.deep.equal({ code: 'abc123', state: 's1' });
    });

    it('omits an absent state', () => {
      expect(parseCallbackParams(new URLSearchParams('code=abc123'))).to.deep.equal(
        { code: 'abc123' }
      );
    });

    it('turns an error parameter into a CancellationError', () => {
      expect(() =>
        parseCallbackParams(
          new URLSearchParams('error=access_denied&error_description=User+declined')
        )
      )
        .to.throw(CancellationError)
        .with.property('message', 'Authorization cancelled: access_denied (User declined)');
    });

    it('prefers the error over a code', () => {
      expect(() =>
        parseCallbackParams(new URLSearchParams('code=abc123&error=access_denied'))
      ).to.throw(CancellationError);
    });

    it('rejects a callback without a code', () => {
      expect(() => parseCallbackParams(new URLSearchParams('state=s1')))
        .to.throw(CallbackError)
        .with.property('reason', 'missing_code');
    });
  });

  describe('parseCallbackInput', () => {
    it('accepts a full redirect URL', () => {
      expect(
        parseCallbackInput(' http://localhost:3030/callback?code=abc123&state=s1\n')
      ).to.deep.equal({ code: 'abc123', state: 's1' });
    });

    it('accepts a query string', () => {
      expect(parseCallbackInput('?code=abc123&state=s1')).to.deep.equal({
        code: 'abc123',
        state: 's1',
      });
    });

    it('accepts a bare code', () => {
      expect(parseCallbackInput('abc123')).to.deep.equal({ code: 'abc123' });
    });

    it('rejects a pasted URL that cannot be parsed', () => {
      let thrown: unknown;
      try {
        parseCallbackInput('http://[bad/callback?code=abc123');
      } catch (error) {
        thrown = error;
      }

      const error = expectInstance(thrown, CallbackError);
      expect(error.reason).to.equal('invalid_redirect');
      expect(error.message).to.equal('Authorization redirect is not a valid URL');
      expect(error.cause).to.be.instanceOf(TypeError);
    });

    it('rejects blank input', () => {
      expect(() => parseCallbackInput('   '))
        .to.throw(CallbackError)
        .with.property('reason', 'missing_code');
    });
  });
});
