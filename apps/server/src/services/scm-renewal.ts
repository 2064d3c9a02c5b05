import type { ScmUserTokenRecord } from '../db/scm-store.js';
import type { CallContext, Connector, OAuthToken } from '../scm/types.js';
import { BadRequestError, UpstreamError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sealSecret, type DecryptedCredential, type ScmServiceDependencies } from './scm-credentials.js';

/**
 * True when the credential can be renewed and is expired or expires within
 * the look-ahead window. Credentials without an expiry are never renewed
 * proactively.
 */
export function needsProactiveRenewal(
  credential: DecryptedCredential,
  windowMs: number,
  now: number = Date.now(),
): boolean {
  if (!credential.refreshToken || !credential.expiresAt) {
    return false;
  }
  return now >= credential.expiresAt.getTime() - windowMs;
}

/**
 * Collapses concurrent renewals of the same credential into one upstream call.
 * Callers that arrive while a renewal is in flight share its result.
 */
export class RenewalGate {
  private readonly inFlight = new Map<string, Promise<OAuthToken>>();

  run(key: string, renew: () => Promise<OAuthToken>): Promise<OAuthToken> {
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const renewal = renew().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, renewal);
    return renewal;
  }

  get size(): number {
    return this.inFlight.size;
  }
}

/**
 * The provider issued a new token but writing it to the store failed. The
 * in-memory credential has already been moved to the new token.
 */
export class RenewedTokenNotSavedError extends UpstreamError {
  constructor(
    readonly token: OAuthToken,
    cause: unknown,
  ) {
    super('failed to store renewed token', cause);
  }
}

/** Settles with `promise`, or rejects as soon as `signal` aborts. */
export function raceSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Exchange the credential's refresh token for a new access token and write it
 * to the stored row. The refresh token is only replaced when the provider
 * rotates it. The in-memory credential is updated from the same response.
 *
 * The upstream renewal is shared by every concurrent caller, so it runs without
 * any caller's abort signal. Each caller stops waiting when its own signal
 * aborts.
 */
export async function renewAndPersist(
  deps: Pick<ScmServiceDependencies, 'store' | 'cipher' | 'renewals'>,
  connector: Connector,
  record: ScmUserTokenRecord,
  credential: DecryptedCredential,
  ctx?: CallContext,
): Promise<DecryptedCredential> {
  const refreshToken = credential.refreshToken;
  if (!refreshToken) {
    throw new BadRequestError('no refresh token is available for this connection');
  }

  const shared = deps.renewals.run(`${record.userId}:${record.scmProviderId}`, async () => {
    const fresh = await connector.renewToken(refreshToken);

    record.accessTokenEncrypted = sealSecret(deps.cipher, fresh.accessToken, 'new access token');
    if (fresh.refreshToken) {
      record.refreshTokenEncrypted = sealSecret(deps.cipher, fresh.refreshToken, 'new refresh token');
    }
    record.expiresAt = fresh.expiresAt;
    record.updatedAt = new Date();

    try {
      await deps.store.saveUserToken(record);
    } catch (err) {
      logger.error(
        {
          userId: record.userId,
          providerId: record.scmProviderId,
          err: err instanceof Error ? err.message : String(err),
        },
        'Failed to store renewed SCM credential',
      );
      throw new RenewedTokenNotSavedError(fresh, err);
    }

    logger.info(
      { userId: record.userId, providerId: record.scmProviderId, expiresAt: fresh.expiresAt },
      'Renewed SCM credential',
    );
    return fresh;
  });

  let renewed: OAuthToken;
  try {
    renewed = await raceSignal(shared, ctx?.signal);
  } catch (err) {
    if (err instanceof RenewedTokenNotSavedError) {
      applyToken(credential, err.token);
    }
    throw err;
  }

  return applyToken(credential, renewed);
}

function applyToken(credential: DecryptedCredential, token: OAuthToken): DecryptedCredential {
  credential.accessToken = token.accessToken;
  if (token.refreshToken) {
    credential.refreshToken = token.refreshToken;
  }
  credential.expiresAt = token.expiresAt;
  return credential;
}
