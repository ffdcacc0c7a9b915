/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Redirect, RedirectRule } from '../types.js';
import { WILDCARD } from './rule-parser.js';

/**
 * Apply a rule to a request path. A wildcard source is a plain string
 * prefix, so "/docs/*" matches "/docsx" as well as "/docs/x".
 */
export function translateRule(
  path: string,
  rule: RedirectRule,
): Redirect | undefined {
  const { from, to, status } = rule;

  if (from === undefined) {
    return { location: to, status };
  }

  if (!from.endsWith(WILDCARD)) {
    return path === from ? { location: to, status } : undefined;
  }

  const prefix = from.slice(0, -WILDCARD.length);
  if (!path.startsWith(prefix)) {
    return undefined;
  }

  const base = to.endsWith(WILDCARD) ? to.slice(0, -WILDCARD.length) : to;
  return {
    location: base + path.slice(prefix.length),
    status,
  };
}
