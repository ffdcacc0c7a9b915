/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type RedirectStatus = 301 | 302 | 303 | 307 | 308;

/**
 * Parsed form of one TXT record. A rule without `from` is a catch-all.
 */
export interface RedirectRule {
  readonly from?: string;
  readonly to: string;
  readonly status: RedirectStatus;
}

export interface Redirect {
  location: string;
  status: RedirectStatus;
}

export interface SignalOptions {
  signal?: AbortSignal;
}

export interface TxtLookup {
  /**
   * Resolve every TXT record at `hostname`, in response order, with
   * multi-string records joined. Rejects with DnsLookupError.
   */
  lookupTxt(hostname: string, options?: SignalOptions): Promise<string[]>;
}

/**
 * Persistent certificate material keyed by hostname, or by a non-domain
 * identifier such as the ACME account key.
 */
export interface CertificateCache {
  get(key: string, options?: SignalOptions): Promise<Buffer | undefined>;
  put(key: string, data: Buffer, options?: SignalOptions): Promise<void>;
  delete(key: string, options?: SignalOptions): Promise<void>;
}

/**
 * Decides whether a certificate may be requested for a hostname. Resolves
 * when allowed and rejects with the reason otherwise.
 */
export interface HostPolicy {
  check(hostname: string, options?: SignalOptions): Promise<void>;
}

export interface IssuedCertificate {
  /** PEM private key */
  key: string;
  /** PEM certificate chain, leaf first */
  cert: string;
}

export interface ChallengeResponder {
  setChallenge(token: string, keyAuthorization: string): void;
  removeChallenge(token: string): void;
}

export interface CertificateIssuer {
  issue(
    hostname: string,
    challenges: ChallengeResponder,
    options?: SignalOptions,
  ): Promise<IssuedCertificate>;
}
