/**
 * Consent Gate Tests
 *
 * The consent service is replaced by an injected fetch.
 */

import { describe, it, expect, vi } from 'vitest';

import { silentLog } from '../../__tests__/fakes';
import { consentScopes, createConsentGate } from '../consentGate';

// =============================================================================
// TEST FIXTURES
// =============================================================================

const SCOPE = consentScopes.extractText('pkg-1');

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const createGate = (fetchImpl: typeof fetch, baseUrl: string | null = 'http://consent.test/') =>
  createConsentGate({ baseUrl, timeoutMs: 1000 }, silentLog, fetchImpl);

// =============================================================================
// TESTS
// =============================================================================

describe('consentScopes', () => {
  it('should build the extraction and analysis scopes', () => {
    expect(SCOPE).toBe('action:extract_text,resource_package_id:pkg-1');
    expect(consentScopes.analyzeText('topics', 'pkg-1', 'gemini')).toBe(
      'action:analyze_text_topics,resource_package_id:pkg-1,model:gemini'
    );
  });
});

describe('ConsentGate', () => {
  it('should grant when the service says the token is valid', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ isValid: true, scopeGranted: { level: 'full' } }));

    const decision = await createGate(fetchMock).verify('user-1', 'consent-token-1', SCOPE);

    expect(decision).toEqual({ isValid: true, grantedScopeDetails: { level: 'full' } });
    expect(fetchMock.mock.calls[0][0]).toBe(
      'http://consent.test/verify?userID=user-1&scope=action%3Aextract_text%2Cresource_package_id%3Apkg-1&consentTokenID=consent-token-1'
    );
  });

  it('should deny with the service reason', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ isValid: false, reason_for_invalidity: 'Token revoked' }));

    expect(await createGate(fetchMock).verify('user-1', 'consent-token-1', SCOPE)).toEqual({
      isValid: false,
      deniedReason: 'Token revoked',
    });
  });

  it('should fall back to a generic reason when the service gives none', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ isValid: false }));

    const decision = await createGate(fetchMock).verify('user-1', 'consent-token-1', SCOPE);
    expect(decision.deniedReason).toBe('Consent denied by consent service');
  });

  it('should deny without calling the service when it is not configured', async () => {
    const fetchMock = vi.fn<typeof fetch>();

    const decision = await createGate(fetchMock, null).verify('user-1', 'consent-token-1', SCOPE);

    expect(decision).toEqual({ isValid: false, deniedReason: 'Consent service not configured' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should deny a missing token without calling the service', async () => {
    const fetchMock = vi.fn<typeof fetch>();

    const decision = await createGate(fetchMock).verify('user-1', null, SCOPE);

    expect(decision.deniedReason).toBe('Missing consentTokenID for verification');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should deny on an HTTP error status', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'boom' }, 502));

    const decision = await createGate(fetchMock).verify('user-1', 'consent-token-1', SCOPE);
    expect(decision.deniedReason).toBe('Consent API HTTP error: 502');
  });

  it('should deny on a network error', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error('ECONNREFUSED'));

    const decision = await createGate(fetchMock).verify('user-1', 'consent-token-1', SCOPE);
    expect(decision.deniedReason).toBe('Consent API request error: ECONNREFUSED');
  });

  it('should deny on a body that is not JSON', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 200 }));

    const decision = await createGate(fetchMock).verify('user-1', 'consent-token-1', SCOPE);
    expect(decision.deniedReason).toBe('Consent API response not valid JSON');
  });

  it('should deny on a body of the wrong shape', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ valid: 'yes' }));

    const decision = await createGate(fetchMock).verify('user-1', 'consent-token-1', SCOPE);
    expect(decision.deniedReason).toBe('Consent API response malformed');
  });
});
