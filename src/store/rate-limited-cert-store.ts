/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { parse as parseDomain } from 'tldts';
import * as winston from 'winston';

import { RateLimitExceededError } from '../lib/error.js';
import { Mutex } from '../lib/mutex.js';
import type { CertificateCache, SignalOptions } from '../types.js';

export const WEEK_MS = 7 * 24 * 60 * 60 * 1000;
export const DEFAULT_WEEKLY_QUOTA_PER_APEX = 2;

/**
 * Registrable domain (eTLD+1) for a cache key, or undefined when the key is
 * not a domain name.
 */
export function apexDomain(key: string): string | undefined {
  const { domain, isIp } = parseDomain(key);
  if (isIp === true || domain === null) {
    return undefined;
  }
  return domain;
}

/**
 * Week buckets are fixed 7-day slices counted from the Unix epoch, not
 * calendar weeks and not rolling windows.
 */
export function weekBucket(now: number): number {
  return Math.floor(now / WEEK_MS);
}

/**
 * Wraps a certificate cache and allows at most `quotaPerApex` successful
 * writes per apex domain per week bucket. Counts live in memory only and
 * start over on restart; the certificate authority enforces the real limit.
 */
export class RateLimitedCertStore implements CertificateCache {
  private log: winston.Logger;
  private cache: CertificateCache;
  private quotaPerApex: number;
  private now: () => number;

  private mutex = new Mutex();
  private counts = new Map<string, number>();
  private currentWeek: number;

  constructor({
    log,
    cache,
    quotaPerApex = DEFAULT_WEEKLY_QUOTA_PER_APEX,
    now = Date.now,
  }: {
    log: winston.Logger;
    cache: CertificateCache;
    quotaPerApex?: number;
    now?: () => number;
  }) {
    this.log = log.child({ class: 'RateLimitedCertStore' });
    this.cache = cache;
    this.quotaPerApex = quotaPerApex;
    this.now = now;
    this.currentWeek = weekBucket(now());
  }

  async get(
    key: string,
    options?: SignalOptions,
  ): Promise<Buffer | undefined> {
    return this.cache.get(key, options);
  }

  async delete(key: string, options?: SignalOptions): Promise<void> {
    return this.cache.delete(key, options);
  }

  async put(
    key: string,
    data: Buffer,
    options: SignalOptions = {},
  ): Promise<void> {
    const apex = apexDomain(key);
    if (apex === undefined) {
      // Not a domain key (e.g. the ACME account key)
      return this.cache.put(key, data, options);
    }

    const log = this.log.child({ method: 'put', key, apex });

    await this.mutex.runExclusive(async () => {
      const week = weekBucket(this.now());
      if (week !== this.currentWeek) {
        log.debug('New week bucket, resetting certificate counts', {
          previousWeek: this.currentWeek,
          week,
        });
        this.counts.clear();
        this.currentWeek = week;
      }

      const count = this.counts.get(apex) ?? 0;
      if (count >= this.quotaPerApex) {
        log.warn('Certificate quota exhausted for apex domain', {
          count,
          quota: this.quotaPerApex,
        });
        throw new RateLimitExceededError(apex, this.quotaPerApex);
      }

      options.signal?.throwIfAborted();
      await this.cache.put(key, data, options);

      this.counts.set(apex, count + 1);
      log.info('Stored certificate', { count: count + 1 });
    }, options);
  }
}
