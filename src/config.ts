/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as acme from 'acme-client';

import * as env from './lib/env.js';
import { DEFAULT_WEEKLY_QUOTA_PER_APEX } from './store/rate-limited-cert-store.js';

//
// HTTP server
//

// Plain HTTP port, used when TLS is disabled
export const PORT = env.intOrDefault('PORT', 8081);

// Where requests without a usable redirect rule are sent
export const FALLBACK_URL = env.varOrDefault(
  'FALLBACK_URL',
  'http://redirect.name/',
);

// Per-request deadline enforced by the server
export const REQUEST_TIMEOUT_MS = env.intOrDefault('REQUEST_TIMEOUT_MS', 5000);

// How long shutdown waits for in-flight requests
export const SHUTDOWN_GRACE_PERIOD_MS = env.intOrDefault(
  'SHUTDOWN_GRACE_PERIOD_MS',
  10_000,
);

// Honor X-Forwarded-* headers when running behind a proxy
export const TRUST_PROXY = env.varOrDefault('TRUST_PROXY', 'false') === 'true';

//
// DNS
//

export const DNS_LOOKUP_TIMEOUT_MS = env.intOrDefault(
  'DNS_LOOKUP_TIMEOUT_MS',
  5000,
);

// Comma-separated resolver addresses, system resolvers when unset
export const DNS_SERVERS = env.listOrUndefined('DNS_SERVERS');

//
// TLS
//

// Setting a certificate directory turns on TLS with on-demand certificates
export const CERT_DIR = env.varOrUndefined('CERT_DIR');

export const HTTP_PORT = env.intOrDefault('HTTP_PORT', 80);
export const HTTPS_PORT = env.intOrDefault('HTTPS_PORT', 443);

export const ACME_DIRECTORY_URL = env.varOrDefault(
  'ACME_DIRECTORY_URL',
  acme.directory.letsencrypt.production,
);

export const ACME_EMAIL = env.varOrUndefined('ACME_EMAIL');

export const CERT_WEEKLY_QUOTA_PER_APEX = env.intOrDefault(
  'CERT_WEEKLY_QUOTA_PER_APEX',
  DEFAULT_WEEKLY_QUOTA_PER_APEX,
);

export const CERT_RENEW_BEFORE_DAYS = env.intOrDefault(
  'CERT_RENEW_BEFORE_DAYS',
  30,
);

export const CERT_ISSUANCE_TIMEOUT_MS = env.intOrDefault(
  'CERT_ISSUANCE_TIMEOUT_MS',
  2 * 60 * 1000,
);
