/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { RedirectRule, RedirectStatus } from '../types.js';

export const WILDCARD = '*';

export const DEFAULT_REDIRECT_STATUS: RedirectStatus = 302;
export const PERMANENT_REDIRECT_STATUS: RedirectStatus = 301;

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

// Redirects [permanently] [from <path>] to <target> [with <code>]
const RULE_REGEX =
  /^Redirects(?<permanently>\s+permanently)?(?:\s+from\s+(?<from>\S+))?\s+to\s+(?<to>\S+)(?:\s+with\s+(?<code>\d+))?$/;

export function isRedirectStatus(code: number): code is RedirectStatus {
  return REDIRECT_STATUSES.has(code);
}

function hasValidWildcard(pattern: string): boolean {
  const index = pattern.indexOf(WILDCARD);
  return index === -1 || index === pattern.length - 1;
}

/**
 * Parse one TXT record into a redirect rule. Records that are not redirect
 * rules (SPF, DKIM, site verification tokens, ...) yield undefined.
 */
export function parseRule(record: string): RedirectRule | undefined {
  const match = RULE_REGEX.exec(record.trim());
  if (match?.groups === undefined) {
    return undefined;
  }

  const { permanently, from, to, code } = match.groups;
  if (to === undefined) {
    return undefined;
  }

  let status: RedirectStatus = permanently
    ? PERMANENT_REDIRECT_STATUS
    : DEFAULT_REDIRECT_STATUS;
  if (code !== undefined) {
    const explicit = Number(code);
    if (!isRedirectStatus(explicit)) {
      return undefined;
    }
    status = explicit;
  }

  if (
    !hasValidWildcard(to) ||
    (from !== undefined && !hasValidWildcard(from))
  ) {
    return undefined;
  }

  // A captured suffix has to land somewhere, and nothing can be captured
  // without a wildcard in the source.
  const capturesSuffix = from !== undefined && from.endsWith(WILDCARD);
  if (capturesSuffix !== to.endsWith(WILDCARD)) {
    return undefined;
  }

  return from !== undefined ? { from, to, status } : { to, status };
}
