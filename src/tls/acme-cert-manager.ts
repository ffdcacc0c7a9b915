/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Handler } from 'express';
import { SecureContext, createSecureContext } from 'node:tls';
import * as winston from 'winston';

import type {
  CertificateCache,
  CertificateIssuer,
  ChallengeResponder,
  HostPolicy,
  IssuedCertificate,
} from '../types.js';
import {
  certificateNotAfter,
  decodeCertBundle,
  encodeCertBundle,
} from './cert-bundle.js';

export const ACME_CHALLENGE_PATH_PREFIX = '/.well-known/acme-challenge/';

const DAY_MS = 24 * 60 * 60 * 1000;

interface InstalledCertificate {
  context: SecureContext;
  notAfter: number;
}

interface FailedIssuance {
  error: unknown;
  retryAt: number;
}

/**
 * Serves TLS certificates by server name, loading them from the certificate
 * cache or issuing them on demand once the host policy allows it.
 */
export class AcmeCertManager implements ChallengeResponder {
  private log: winston.Logger;
  private cache: CertificateCache;
  private hostPolicy: HostPolicy;
  private issuer: CertificateIssuer;
  private renewBeforeMs: number;
  private issuanceTimeoutMs: number;
  private retryAfterMs: number;
  private now: () => number;

  private installed = new Map<string, InstalledCertificate>();
  private pending = new Map<string, Promise<SecureContext>>();
  private renewing = new Set<string>();
  private failures = new Map<string, FailedIssuance>();
  private challengeTokens = new Map<string, string>();

  constructor({
    log,
    cache,
    hostPolicy,
    issuer,
    renewBeforeMs = 30 * DAY_MS,
    issuanceTimeoutMs = 2 * 60 * 1000,
    retryAfterMs = 60 * 1000,
    now = Date.now,
  }: {
    log: winston.Logger;
    cache: CertificateCache;
    hostPolicy: HostPolicy;
    issuer: CertificateIssuer;
    renewBeforeMs?: number;
    issuanceTimeoutMs?: number;
    retryAfterMs?: number;
    now?: () => number;
  }) {
    this.log = log.child({ class: 'AcmeCertManager' });
    this.cache = cache;
    this.hostPolicy = hostPolicy;
    this.issuer = issuer;
    this.renewBeforeMs = renewBeforeMs;
    this.issuanceTimeoutMs = issuanceTimeoutMs;
    this.retryAfterMs = retryAfterMs;
    this.now = now;
  }

  setChallenge(token: string, keyAuthorization: string): void {
    this.challengeTokens.set(token, keyAuthorization);
  }

  removeChallenge(token: string): void {
    this.challengeTokens.delete(token);
  }

  /**
   * Answers HTTP-01 challenges for in-flight orders. Anything else, unknown
   * tokens included, goes to the next handler.
   */
  challengeMiddleware(): Handler {
    return (req, res, next) => {
      if (
        (req.method !== 'GET' && req.method !== 'HEAD') ||
        !req.path.startsWith(ACME_CHALLENGE_PATH_PREFIX)
      ) {
        next();
        return;
      }

      const token = req.path.slice(ACME_CHALLENGE_PATH_PREFIX.length);
      const keyAuthorization = this.challengeTokens.get(token);
      if (keyAuthorization === undefined) {
        next();
        return;
      }

      res.type('text/plain').send(keyAuthorization);
    };
  }

  /**
   * `SNICallback` for `https.createServer`.
   */
  sniCallback = (
    servername: string,
    cb: (err: Error | null, ctx?: SecureContext) => void,
  ): void => {
    this.getSecureContext(servername).then(
      (context) => cb(null, context),
      (error: unknown) => {
        this.log.warn('No certificate for server name', {
          servername,
          error: error instanceof Error ? error.message : String(error),
        });
        cb(error instanceof Error ? error : new Error(String(error)));
      },
    );
  };

  async getSecureContext(servername: string): Promise<SecureContext> {
    const hostname = servername.toLowerCase().replace(/\.$/, '');
    if (hostname === '') {
      throw new Error('TLS client did not send a server name');
    }

    const installed = this.installed.get(hostname);
    if (installed !== undefined && installed.notAfter > this.now()) {
      this.renewIfDue(hostname, installed.notAfter);
      return installed.context;
    }

    let pending = this.pending.get(hostname);
    if (pending === undefined) {
      pending = this.loadOrIssue(hostname).finally(() => {
        this.pending.delete(hostname);
      });
      this.pending.set(hostname, pending);
    }
    return pending;
  }

  private async loadOrIssue(hostname: string): Promise<SecureContext> {
    const stored = await this.cache.get(hostname);
    const bundle = stored !== undefined ? decodeCertBundle(stored) : undefined;

    if (bundle !== undefined) {
      const notAfter = certificateNotAfter(bundle.cert).getTime();
      if (notAfter > this.now()) {
        this.log.debug('Loaded certificate from cache', { hostname });
        const context = this.install(hostname, bundle, notAfter);
        this.renewIfDue(hostname, notAfter);
        return context;
      }
      this.log.info('Cached certificate expired', { hostname });
    }

    return this.issue(hostname);
  }

  private async issue(hostname: string): Promise<SecureContext> {
    const log = this.log.child({ method: 'issue', hostname });

    const failure = this.failures.get(hostname);
    if (failure !== undefined) {
      if (failure.retryAt > this.now()) {
        throw failure.error;
      }
      this.failures.delete(hostname);
    }

    const signal = AbortSignal.timeout(this.issuanceTimeoutMs);
    try {
      await this.hostPolicy.check(hostname, { signal });

      log.info('Requesting certificate');
      const issued = await this.issuer.issue(hostname, this, { signal });
      // An issued certificate is stored regardless of the deadline
      await this.cache.put(hostname, encodeCertBundle(issued));

      const notAfter = certificateNotAfter(issued.cert).getTime();
      log.info('Certificate issued', {
        notAfter: new Date(notAfter).toISOString(),
      });
      return this.install(hostname, issued, notAfter);
    } catch (error) {
      log.warn('Certificate issuance failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      this.sweepFailures();
      this.failures.set(hostname, {
        error,
        retryAt: this.now() + this.retryAfterMs,
      });
      throw error;
    }
  }

  // Drop hold-offs that have run out
  private sweepFailures(): void {
    const now = this.now();
    for (const [hostname, { retryAt }] of this.failures) {
      if (retryAt <= now) {
        this.failures.delete(hostname);
      }
    }
  }

  /**
   * Number of hostnames currently held off after a failed issuance.
   */
  heldOffCount(): number {
    return this.failures.size;
  }

  private install(
    hostname: string,
    { key, cert }: IssuedCertificate,
    notAfter: number,
  ): SecureContext {
    const context = createSecureContext({ key, cert });
    this.installed.set(hostname, { context, notAfter });
    return context;
  }

  private renewIfDue(hostname: string, notAfter: number): void {
    if (
      notAfter - this.now() > this.renewBeforeMs ||
      this.renewing.has(hostname)
    ) {
      return;
    }

    this.renewing.add(hostname);
    this.log.info('Renewing certificate', {
      hostname,
      notAfter: new Date(notAfter).toISOString(),
    });
    this.issue(hostname)
      .catch((error: unknown) => {
        // The current certificate stays in service until it expires
        this.log.debug('Background renewal did not complete', {
          hostname,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.renewing.delete(hostname);
      });
  }
}
