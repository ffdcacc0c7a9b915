/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as acme from 'acme-client';
import * as winston from 'winston';

import type {
  CertificateCache,
  CertificateIssuer,
  ChallengeResponder,
  IssuedCertificate,
  SignalOptions,
} from '../types.js';

// Not a domain name, so the certificate quota never applies to it
export const ACCOUNT_KEY_CACHE_KEY = 'acme_account+key';

/**
 * Issues single-hostname certificates over ACME using HTTP-01 challenges.
 * The account key is created on first use and kept in the certificate cache.
 */
export class AcmeClientIssuer implements CertificateIssuer {
  private log: winston.Logger;
  private cache: CertificateCache;
  private directoryUrl: string;
  private email: string | undefined;
  private client: Promise<acme.Client> | undefined;

  constructor({
    log,
    cache,
    directoryUrl,
    email,
  }: {
    log: winston.Logger;
    cache: CertificateCache;
    directoryUrl: string;
    email?: string;
  }) {
    this.log = log.child({ class: 'AcmeClientIssuer' });
    this.cache = cache;
    this.directoryUrl = directoryUrl;
    this.email = email;
  }

  private getClient(): Promise<acme.Client> {
    if (this.client === undefined) {
      this.client = this.createClient().catch((error: unknown) => {
        // Let the next issuance try again
        this.client = undefined;
        throw error;
      });
    }
    return this.client;
  }

  private async createClient(): Promise<acme.Client> {
    let accountKey = await this.cache.get(ACCOUNT_KEY_CACHE_KEY);
    if (accountKey === undefined) {
      accountKey = await acme.crypto.createPrivateKey();
      await this.cache.put(ACCOUNT_KEY_CACHE_KEY, accountKey);
      this.log.info('Created ACME account key', {
        directoryUrl: this.directoryUrl,
      });
    }

    return new acme.Client({ directoryUrl: this.directoryUrl, accountKey });
  }

  async issue(
    hostname: string,
    challenges: ChallengeResponder,
    { signal }: SignalOptions = {},
  ): Promise<IssuedCertificate> {
    const log = this.log.child({ method: 'issue', hostname });

    signal?.throwIfAborted();
    const client = await this.getClient();
    const [key, csr] = await acme.crypto.createCsr({ commonName: hostname });
    signal?.throwIfAborted();

    log.debug('Starting ACME order');
    const cert = await client.auto({
      csr,
      email: this.email,
      termsOfServiceAgreed: true,
      challengePriority: ['http-01'],
      challengeCreateFn: async (_authz, challenge, keyAuthorization) => {
        if (challenge.type !== 'http-01') {
          throw new Error(`Unsupported challenge type: ${challenge.type}`);
        }
        challenges.setChallenge(challenge.token, keyAuthorization);
      },
      challengeRemoveFn: async (_authz, challenge) => {
        if (challenge.type === 'http-01') {
          challenges.removeChallenge(challenge.token);
        }
      },
    });
    log.debug('ACME order finalized');

    return { key: key.toString('utf8'), cert };
  }
}
