/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it, mock } from 'node:test';

import { createTestLogger } from '../../test/test-logger.js';
import { DnsLookupError, HostNotAllowedError } from '../lib/error.js';
import type { SignalOptions, TxtLookup } from '../types.js';
import { TxtRecordHostPolicy, redirectRecordName } from './host-policy.js';

const log = createTestLogger({ suite: 'TxtRecordHostPolicy' });

function stubLookup(
  lookup: (hostname: string, options?: SignalOptions) => Promise<string[]>,
) {
  return { lookupTxt: mock.fn(lookup) } satisfies TxtLookup;
}

describe('redirectRecordName', () => {
  it('should prefix the hostname', () => {
    assert.equal(
      redirectRecordName('foo.example.com'),
      '_redirect.foo.example.com',
    );
  });
});

describe('TxtRecordHostPolicy', () => {
  it('should allow a host with a parseable rule', async () => {
    const txtLookup = stubLookup(async () => [
      'Redirects to https://example.com',
    ]);
    const policy = new TxtRecordHostPolicy({ log, txtLookup });

    await policy.check('foo.example.com');

    assert.equal(txtLookup.lookupTxt.mock.calls.length, 1);
    assert.equal(
      txtLookup.lookupTxt.mock.calls[0].arguments[0],
      '_redirect.foo.example.com',
    );
  });

  it('should allow a scoped rule that matches nothing in particular', async () => {
    const policy = new TxtRecordHostPolicy({
      log,
      txtLookup: stubLookup(async () => [
        'v=spf1 -all',
        'Redirects from /never/matched to https://example.com/',
      ]),
    });

    await policy.check('foo.example.com');
  });

  it('should deny with the DNS failure when the lookup fails', async () => {
    const policy = new TxtRecordHostPolicy({
      log,
      txtLookup: stubLookup(async (hostname) => {
        throw new DnsLookupError(hostname, 'no such host');
      }),
    });

    await assert.rejects(
      policy.check('foo.example.com'),
      (error: unknown) =>
        error instanceof DnsLookupError &&
        error.message ===
          'DNS lookup failed for _redirect.foo.example.com: no such host',
    );
  });

  it('should deny when no record is a redirect rule', async () => {
    const policy = new TxtRecordHostPolicy({
      log,
      txtLookup: stubLookup(async () => ['v=spf1 include:example.com ~all']),
    });

    await assert.rejects(
      policy.check('foo.example.com'),
      (error: unknown) =>
        error instanceof HostNotAllowedError &&
        error.message ===
          'no valid redirect config in TXT records for _redirect.foo.example.com',
    );
  });

  it('should deny when there are no records at all', async () => {
    const policy = new TxtRecordHostPolicy({
      log,
      txtLookup: stubLookup(async () => []),
    });

    await assert.rejects(policy.check('foo.example.com'), HostNotAllowedError);
  });

  it('should pass the signal to the lookup', async () => {
    const txtLookup = stubLookup(async () => ['Redirects to https://example.com']);
    const policy = new TxtRecordHostPolicy({ log, txtLookup });
    const controller = new AbortController();

    await policy.check('foo.example.com', { signal: controller.signal });

    assert.deepEqual(txtLookup.lookupTxt.mock.calls[0].arguments[1], {
      signal: controller.signal,
    });
  });
});
