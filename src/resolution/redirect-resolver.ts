/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { NoMatchError } from '../lib/error.js';
import type { Redirect, RedirectRule } from '../types.js';
import { parseRule } from './rule-parser.js';
import { translateRule } from './rule-translator.js';

/**
 * Resolve a request path against a hostname's TXT records.
 *
 * Scoped rules are tried in record order and the first match wins.
 * Catch-all rules only apply once every scoped rule has missed, whatever
 * their position among the records.
 *
 * @throws NoMatchError when no rule produces a redirect
 */
export function resolveRedirect(
  records: readonly string[],
  path: string,
): Redirect {
  const catchAlls: RedirectRule[] = [];

  for (const record of records) {
    const rule = parseRule(record);
    if (rule === undefined) {
      continue;
    }

    if (rule.from === undefined) {
      catchAlls.push(rule);
      continue;
    }

    const redirect = translateRule(path, rule);
    if (redirect !== undefined) {
      return redirect;
    }
  }

  for (const rule of catchAlls) {
    const redirect = translateRule(path, rule);
    if (redirect !== undefined) {
      return redirect;
    }
  }

  throw new NoMatchError(path);
}
