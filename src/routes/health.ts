/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router } from 'express';

export const HEALTH_CHECK_PATH = '/healthz';

export function createHealthRouter(): Router {
  // Only the exact path; /HEALTHZ and /healthz/ are ordinary redirect paths
  const healthRouter = Router({ caseSensitive: true, strict: true });

  healthRouter.get(HEALTH_CHECK_PATH, (_req, res) => {
    res.status(200).type('text/plain').send('ok\n');
  });

  return healthRouter;
}
