/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { HostNotAllowedError } from '../lib/error.js';
import { parseRule } from '../resolution/rule-parser.js';
import type { HostPolicy, SignalOptions, TxtLookup } from '../types.js';

export const REDIRECT_RECORD_PREFIX = '_redirect.';

export function redirectRecordName(hostname: string): string {
  return `${REDIRECT_RECORD_PREFIX}${hostname}`;
}

/**
 * Allows certificates only for hostnames publishing at least one redirect
 * rule. Whether the rule ever matches a path is irrelevant here.
 */
export class TxtRecordHostPolicy implements HostPolicy {
  private log: winston.Logger;
  private txtLookup: TxtLookup;

  constructor({
    log,
    txtLookup,
  }: {
    log: winston.Logger;
    txtLookup: TxtLookup;
  }) {
    this.log = log.child({ class: 'TxtRecordHostPolicy' });
    this.txtLookup = txtLookup;
  }

  /**
   * @throws DnsLookupError when the TXT query fails
   * @throws HostNotAllowedError when no record is a redirect rule
   */
  async check(hostname: string, { signal }: SignalOptions = {}): Promise<void> {
    const recordName = redirectRecordName(hostname);
    const records = await this.txtLookup.lookupTxt(recordName, { signal });

    if (records.some((record) => parseRule(record) !== undefined)) {
      return;
    }

    this.log.info('Refusing certificate for host without redirect rules', {
      hostname,
      records: records.length,
    });
    throw new HostNotAllowedError(recordName);
  }
}
