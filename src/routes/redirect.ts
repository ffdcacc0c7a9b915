/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router, Request, Response } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import { Logger } from 'winston';

import { DnsLookupError, NoMatchError } from '../lib/error.js';
import { PERMANENT_REDIRECT_STATUS } from '../resolution/rule-parser.js';
import { resolveRedirect } from '../resolution/redirect-resolver.js';
import { redirectRecordName } from '../tls/host-policy.js';
import type { TxtLookup } from '../types.js';

export const PERMANENT_REDIRECT_CACHE_CONTROL = 'max-age=86400';

export interface RedirectRouterConfig {
  log: Logger;
  txtLookup: TxtLookup;
  fallbackUrl: string;
}

/**
 * Form-encodes a value: letters, digits and `-_.~` stay as they are, spaces
 * become `+` and everything else is percent-encoded.
 */
export function formEncode(value: string): string {
  return encodeURIComponent(value)
    .replace(
      /[!'()*]/g,
      (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
    )
    .replace(/%20/g, '+');
}

/**
 * Location used when a request cannot be redirected. The reason travels in
 * the fragment so the fallback page can show it.
 */
export function fallbackLocation(fallbackUrl: string, reason: string): string {
  return `${fallbackUrl}#reason=${formEncode(reason)}`;
}

export function createRedirectRouter({
  log,
  txtLookup,
  fallbackUrl,
}: RedirectRouterConfig): Router {
  const redirectRouter = Router();

  redirectRouter.use(
    asyncHandler(async (req: Request, res: Response) => {
      const hostname = req.hostname;
      // Path plus query string, as received
      const path = req.originalUrl;
      const recordName = redirectRecordName(hostname);

      let records: string[];
      try {
        records = await txtLookup.lookupTxt(recordName, {
          signal: req.signal,
        });
      } catch (error) {
        if (!(error instanceof DnsLookupError)) {
          throw error;
        }
        log.warn('Could not resolve redirect records', {
          hostname,
          code: error.code,
          error: error.message,
        });
        res.redirect(
          302,
          fallbackLocation(
            fallbackUrl,
            `Could not resolve hostname (${error.message})`,
          ),
        );
        return;
      }

      try {
        const { location, status } = resolveRedirect(records, path);
        if (status === PERMANENT_REDIRECT_STATUS) {
          res.set('Cache-Control', PERMANENT_REDIRECT_CACHE_CONTROL);
        }
        res.redirect(status, location);
      } catch (error) {
        if (!(error instanceof NoMatchError)) {
          throw error;
        }
        log.info('No redirect rule matched', { hostname, path });
        res.redirect(302, fallbackLocation(fallbackUrl, error.message));
      }
    }),
  );

  return redirectRouter;
}
