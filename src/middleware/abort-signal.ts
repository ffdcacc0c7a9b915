/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler, Request, Response } from 'express';

/**
 * Attaches an AbortSignal to each request. The signal aborts when the client
 * disconnects before the response completes, so a pending TXT lookup for a
 * request nobody waits on is cancelled.
 *
 *   await txtLookup.lookupTxt(name, { signal: req.signal });
 */
export function createAbortSignalMiddleware(): Handler {
  return (req: Request, res: Response, next) => {
    const controller = new AbortController();

    // The response closes without finishing when the client goes away
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort(new Error('Client disconnected'));
      }
    });

    req.signal = controller.signal;

    next();
  };
}
