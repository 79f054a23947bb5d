/**
 * Consent Gate
 *
 * Asks the consent service whether a user's consent token grants a scope.
 * Every failure path denies: no configured service, missing token, HTTP
 * error, network error, timeout, or a body that cannot be read.
 */

import { z } from 'zod';

import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';

// =============================================================================
// TYPES
// =============================================================================

export interface ConsentDecision {
  isValid: boolean;
  deniedReason?: string;
  grantedScopeDetails?: Record<string, unknown>;
}

export interface ConsentGateConfig {
  /** Base URL of the consent service; null disables it (every check denies) */
  baseUrl: string | null;
  timeoutMs?: number;
}

export interface ConsentVerifier {
  verify(userID: string, consentTokenID: string | null, requiredScope: string): Promise<ConsentDecision>;
}

const ConsentResponseSchema = z.object({
  isValid: z.boolean(),
  scopeGranted: z.record(z.unknown()).nullish(),
  reason_for_invalidity: z.string().nullish(),
});

// =============================================================================
// SCOPES
// =============================================================================

export const consentScopes = {
  extractText: (packageID: string) => `action:extract_text,resource_package_id:${packageID}`,

  analyzeText: (task: string, packageID: string, provider: string) =>
    `action:analyze_text_${task},resource_package_id:${packageID},model:${provider}`,
};

// =============================================================================
// CONSENT GATE
// =============================================================================

export class ConsentGate implements ConsentVerifier {
  private readonly baseUrl: string | null;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Log;

  constructor(config: ConsentGateConfig, log: Log = rootLogger, fetchImpl: typeof fetch = fetch) {
    this.baseUrl = config.baseUrl ? config.baseUrl.replace(/\/+$/, '') : null;
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.fetchImpl = fetchImpl;
    this.log = log.child({ component: 'consent' });
  }

  async verify(
    userID: string,
    consentTokenID: string | null,
    requiredScope: string
  ): Promise<ConsentDecision> {
    if (!this.baseUrl) {
      return this.deny('Consent service not configured', { userID, requiredScope });
    }
    if (!consentTokenID) {
      return this.deny('Missing consentTokenID for verification', { userID, requiredScope });
    }

    const query = new URLSearchParams({ userID, scope: requiredScope, consentTokenID });
    const url = `${this.baseUrl}/verify?${query.toString()}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return this.deny(`Consent API request error: ${errorMessage(error)}`, { userID, requiredScope });
    }

    if (!response.ok) {
      return this.deny(`Consent API HTTP error: ${response.status}`, { userID, requiredScope });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return this.deny('Consent API response not valid JSON', { userID, requiredScope });
    }

    const parsed = ConsentResponseSchema.safeParse(body);
    if (!parsed.success) {
      return this.deny('Consent API response malformed', { userID, requiredScope });
    }

    if (!parsed.data.isValid) {
      return this.deny(parsed.data.reason_for_invalidity || 'Consent denied by consent service', {
        userID,
        requiredScope,
      });
    }

    this.log.debug('Consent granted', { userID, requiredScope });
    return {
      isValid: true,
      grantedScopeDetails: parsed.data.scopeGranted ?? undefined,
    };
  }

  private deny(reason: string, context: Record<string, unknown>): ConsentDecision {
    this.log.warn('Consent denied', { ...context, reason });
    return { isValid: false, deniedReason: reason };
  }
}

export function createConsentGate(
  config: ConsentGateConfig,
  log?: Log,
  fetchImpl?: typeof fetch
): ConsentGate {
  return new ConsentGate(config, log, fetchImpl);
}
