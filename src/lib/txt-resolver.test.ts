/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { Resolver } from 'node:dns/promises';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';

import { createTestLogger } from '../../test/test-logger.js';
import { DnsLookupError } from './error.js';
import { DnsTxtResolver } from './txt-resolver.js';

const log = createTestLogger({ suite: 'DnsTxtResolver' });

function dnsError(code: string, hostname: string): Error {
  return Object.assign(new Error(`queryTxt ${code} ${hostname}`), { code });
}

describe('DnsTxtResolver', () => {
  let txtResolver: DnsTxtResolver;

  beforeEach(() => {
    txtResolver = new DnsTxtResolver({ log });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('should return records in response order', async () => {
    const resolveTxt = mock.method(
      Resolver.prototype,
      'resolveTxt',
      async () => [
        ['Redirects from /a to https://example.com/a'],
        ['v=spf1 -all'],
      ],
    );

    const records = await txtResolver.lookupTxt('_redirect.example.com');

    assert.deepEqual(records, [
      'Redirects from /a to https://example.com/a',
      'v=spf1 -all',
    ]);
    assert.equal(resolveTxt.mock.calls.length, 1);
    assert.equal(
      resolveTxt.mock.calls[0].arguments[0],
      '_redirect.example.com',
    );
  });

  it('should join multi-string records', async () => {
    mock.method(Resolver.prototype, 'resolveTxt', async () => [
      ['Redirects to https://example.com/', 'very/long/path'],
    ]);

    const records = await txtResolver.lookupTxt('_redirect.example.com');

    assert.deepEqual(records, ['Redirects to https://example.com/very/long/path']);
  });

  it('should wrap resolver failures in DnsLookupError', async () => {
    mock.method(Resolver.prototype, 'resolveTxt', async () => {
      throw dnsError('ENOTFOUND', '_redirect.missing.example');
    });

    await assert.rejects(
      txtResolver.lookupTxt('_redirect.missing.example'),
      (error: unknown) => {
        assert.ok(error instanceof DnsLookupError);
        assert.equal(error.hostname, '_redirect.missing.example');
        assert.equal(error.code, 'ENOTFOUND');
        assert.equal(error.detail, 'queryTxt ENOTFOUND _redirect.missing.example');
        assert.equal(
          error.message,
          'DNS lookup failed for _redirect.missing.example: queryTxt ENOTFOUND _redirect.missing.example',
        );
        return true;
      },
    );
  });

  it('should not query when the signal is already aborted', async () => {
    const resolveTxt = mock.method(
      Resolver.prototype,
      'resolveTxt',
      async () => [],
    );
    const controller = new AbortController();
    controller.abort(new Error('client went away'));

    await assert.rejects(
      txtResolver.lookupTxt('_redirect.example.com', {
        signal: controller.signal,
      }),
      (error: unknown) =>
        error instanceof DnsLookupError &&
        error.code === 'ECANCELLED' &&
        error.detail === 'client went away',
    );
    assert.equal(resolveTxt.mock.calls.length, 0);
  });

  it('should cancel the query when the signal aborts', async () => {
    const cancel = mock.method(Resolver.prototype, 'cancel', () => undefined);
    const controller = new AbortController();
    mock.method(Resolver.prototype, 'resolveTxt', async () => {
      controller.abort();
      throw dnsError('ECANCELLED', '_redirect.example.com');
    });

    await assert.rejects(
      txtResolver.lookupTxt('_redirect.example.com', {
        signal: controller.signal,
      }),
      (error: unknown) =>
        error instanceof DnsLookupError && error.code === 'ECANCELLED',
    );
    assert.equal(cancel.mock.calls.length, 1);
  });

  it('should use the configured servers', async () => {
    const setServers = mock.method(
      Resolver.prototype,
      'setServers',
      () => undefined,
    );
    mock.method(Resolver.prototype, 'resolveTxt', async () => []);

    const custom = new DnsTxtResolver({ log, servers: ['192.0.2.53'] });
    assert.deepEqual(await custom.lookupTxt('_redirect.example.com'), []);

    assert.equal(setServers.mock.calls.length, 1);
    assert.deepEqual(setServers.mock.calls[0].arguments[0], ['192.0.2.53']);
  });
});
