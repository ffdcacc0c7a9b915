/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      name,
      message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * No rule in a hostname's TXT records produced a redirect for the path.
 */
export class NoMatchError extends DetailedError {
  readonly path: string;

  constructor(path: string) {
    super('No paths matched');
    this.path = path;
  }
}

/**
 * The TXT query itself failed (NXDOMAIN, no data, timeout, SERVFAIL...).
 * `detail` is the resolver's own description of the failure.
 */
export class DnsLookupError extends DetailedError {
  readonly hostname: string;
  readonly detail: string;
  readonly code: string | undefined;

  constructor(
    hostname: string,
    detail: string,
    { code, cause }: { code?: string; cause?: unknown } = {},
  ) {
    super(`DNS lookup failed for ${hostname}: ${detail}`, { cause });
    this.hostname = hostname;
    this.detail = detail;
    this.code = code;
  }
}

/**
 * TXT records exist for the hostname but none of them is a redirect rule.
 */
export class HostNotAllowedError extends DetailedError {
  readonly hostname: string;

  constructor(hostname: string) {
    super(`no valid redirect config in TXT records for ${hostname}`);
    this.hostname = hostname;
  }
}

export class RateLimitExceededError extends DetailedError {
  readonly apex: string;
  readonly limit: number;

  constructor(apex: string, limit: number) {
    super(
      `rate limit exceeded: ${limit} certs already issued for ${apex} this week`,
    );
    this.apex = apex;
    this.limit = limit;
  }
}
