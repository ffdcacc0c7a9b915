/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as acme from 'acme-client';

import * as config from './config.js';
import { DnsTxtResolver } from './lib/txt-resolver.js';
import log from './log.js';
import { FsCertStore } from './store/fs-cert-store.js';
import { RateLimitedCertStore } from './store/rate-limited-cert-store.js';
import { AcmeCertManager } from './tls/acme-cert-manager.js';
import { AcmeClientIssuer } from './tls/acme-issuer.js';
import { TxtRecordHostPolicy } from './tls/host-policy.js';
import type { HostPolicy, TxtLookup } from './types.js';

// Shutdown registry for managing cleanup handlers
type CleanupHandler = {
  name: string;
  handler: () => Promise<void>;
};

const cleanupHandlers: CleanupHandler[] = [];

/**
 * Register a cleanup handler to be called during shutdown.
 * Handlers are called in the order they are registered.
 */
export function registerCleanupHandler(
  name: string,
  handler: () => Promise<void>,
): void {
  cleanupHandlers.push({ name, handler });
  log.debug(`Registered cleanup handler: ${name}`);
}

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception:', error);
});

acme.setLogger((message: string) => {
  log.debug(message, { class: 'acme-client' });
});

export const txtLookup: TxtLookup = new DnsTxtResolver({
  log,
  servers: config.DNS_SERVERS,
  timeoutMs: config.DNS_LOOKUP_TIMEOUT_MS,
});

export const hostPolicy: HostPolicy = new TxtRecordHostPolicy({
  log,
  txtLookup,
});

function createCertManager(certDir: string): AcmeCertManager {
  // The ACME account key shares this store; its key is not a domain, so the
  // quota leaves it alone
  const cache = new RateLimitedCertStore({
    log,
    cache: new FsCertStore({ baseDir: certDir }),
    quotaPerApex: config.CERT_WEEKLY_QUOTA_PER_APEX,
  });

  return new AcmeCertManager({
    log,
    cache,
    hostPolicy,
    issuer: new AcmeClientIssuer({
      log,
      cache,
      directoryUrl: config.ACME_DIRECTORY_URL,
      email: config.ACME_EMAIL,
    }),
    renewBeforeMs: config.CERT_RENEW_BEFORE_DAYS * 24 * 60 * 60 * 1000,
    issuanceTimeoutMs: config.CERT_ISSUANCE_TIMEOUT_MS,
  });
}

export const certManager =
  config.CERT_DIR !== undefined
    ? createCertManager(config.CERT_DIR)
    : undefined;

let isShuttingDown = false;

export const shutdown = async (exitCode = 0) => {
  if (isShuttingDown) {
    log.info('Shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  log.info('Shutting down...');

  for (const { name, handler } of cleanupHandlers) {
    try {
      log.debug(`Running cleanup handler: ${name}`);
      await handler();
      log.debug(`Cleanup handler completed: ${name}`);
    } catch (error) {
      log.error(`Error in cleanup handler: ${name}`, {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      exitCode = 1;
    }
  }

  log.info('Shutdown complete');
  process.exit(exitCode);
};

// Handle shutdown signals
process.on('SIGINT', async () => {
  await shutdown();
});

process.on('SIGTERM', async () => {
  await shutdown();
});
