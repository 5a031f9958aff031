import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { landingRedirect } from '../web/routes.js';

describe('landingRedirect', () => {
  it('sends a signed-in user to the inbox', () => {
    assert.equal(landingRedirect({ signedIn: true, configured: true }), '/inbox');
  });

  it('shows the setup page when the OAuth client is gone, even with tokens', () => {
    assert.equal(landingRedirect({ signedIn: true, configured: false }), null);
  });

  it('shows the connect page to a signed-out visitor', () => {
    assert.equal(landingRedirect({ signedIn: false, configured: true }), null);
  });
});
