/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Resolver } from 'node:dns/promises';
import * as winston from 'winston';

import { DnsLookupError } from './error.js';
import type { SignalOptions, TxtLookup } from '../types.js';

function errorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * TXT lookups straight from DNS. Every call issues its own query: nothing is
 * cached or shared between concurrent lookups of the same name.
 */
export class DnsTxtResolver implements TxtLookup {
  private log: winston.Logger;
  private servers: string[] | undefined;
  private timeoutMs: number;
  private tries: number;

  constructor({
    log,
    servers,
    timeoutMs = 5000,
    tries = 2,
  }: {
    log: winston.Logger;
    servers?: string[];
    timeoutMs?: number;
    tries?: number;
  }) {
    this.log = log.child({ class: 'DnsTxtResolver' });
    this.servers = servers;
    this.timeoutMs = timeoutMs;
    this.tries = tries;
  }

  async lookupTxt(
    hostname: string,
    { signal }: SignalOptions = {},
  ): Promise<string[]> {
    const log = this.log.child({ method: 'lookupTxt', hostname });

    if (signal?.aborted) {
      throw new DnsLookupError(hostname, errorMessage(signal.reason), {
        code: 'ECANCELLED',
        cause: signal.reason,
      });
    }

    // A resolver per lookup so cancelling one query never cancels another
    const resolver = new Resolver({
      timeout: this.timeoutMs,
      tries: this.tries,
    });
    if (this.servers !== undefined) {
      resolver.setServers(this.servers);
    }

    const onAbort = () => resolver.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const chunkedRecords = await resolver.resolveTxt(hostname);
      // Long TXT records arrive as several character-strings
      const records = chunkedRecords.map((chunks) => chunks.join(''));
      log.debug('Resolved TXT records', { count: records.length });
      return records;
    } catch (error) {
      const code = errorCode(error);
      log.debug('TXT lookup failed', { code, error: errorMessage(error) });
      throw new DnsLookupError(hostname, errorMessage(error), {
        code,
        cause: error,
      });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
