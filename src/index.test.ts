/**
 * Test file for the package entry point
 * Co-located with the main module for better maintainability
 */

import { expect } from 'chai';
import { describe, it } from 'mocha';

// Import the module being tested
import {
  version,
  BaseEmailOAuthAdapter,
  GoogleEmailAdapter,
  MicrosoftEmailAdapter,
  createEmailOAuthService,
} from './index.js';
import { moduleData } from './fixtures/test-data.js';
import { MockTransport } from './testUtils/logTransports.js';

describe('Vendor Email OAuth', () => {
  it('should export all required modules and properties', async () => {
    expect(version).to.equal(moduleData.expectedVersion);

    expect(BaseEmailOAuthAdapter).to.be.a('function');
    expect(Object.getPrototypeOf(GoogleEmailAdapter)).to.equal(BaseEmailOAuthAdapter);
    expect(Object.getPrototypeOf(MicrosoftEmailAdapter)).to.equal(BaseEmailOAuthAdapter);

    // Test default export
    const module = await import('./index.js');
    expect(module.default).to.deep.equal({ version: moduleData.expectedVersion });

    // Test all exports are present
    moduleData.expectedExports.forEach((exportName: string) => {
      expect(module).to.have.property(exportName);
    });
  });

  it('builds a working service from the entry point', async () => {
    const { service } = createEmailOAuthService({
      env: {},
      transport: new MockTransport(),
    });

    const config = await service.storeConfiguration({
      provider: 'google',
      vendorId: 10,
      locationId: 20,
      clientId: 'entry-client',
      clientSecret: 'test-secret',
      redirectUri: 'https://x.test/entry/cb',
    });

    expect(config).to.include({ provider: 'google', hasAccessToken: false });
    expect((await service.getAuthUrl(config.id)).authUrl).to.contain(
      'client_id=entry-client'
    );
  });
});
