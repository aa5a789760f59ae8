/**
 * Test file for the package entry point
 * Co-located with the main module for better maintainability
 */

import { expect } from 'chai';
import { describe, it } from 'mocha';

import { version, OAuthClientProvider, ProviderState } from './index.js';
import { moduleData } from './fixtures/test-data.js';

describe('package entry point', () => {
  it('should export all required modules and properties', async () => {
    expect(version).to.equal(moduleData.expectedVersion);
    expect(OAuthClientProvider).to.be.a('function');
    expect(ProviderState.Authorized).to.equal('authorized');

    const module = await import('./index.js');
    expect(module.default).to.deep.equal({ version: moduleData.expectedVersion });

    moduleData.expectedExports.forEach((exportName: string) => {
      expect(module).to.have.property(exportName);
    });
  });
});
