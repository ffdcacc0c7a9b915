/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Server as HttpServer } from 'node:http';
import { Server as HttpsServer } from 'node:https';
import * as winston from 'winston';

/**
 * Stops accepting connections and waits for in-flight requests. Connections
 * still open after `gracePeriodMs` are destroyed.
 */
export async function closeServer(
  server: HttpServer | HttpsServer,
  { log, gracePeriodMs }: { log: winston.Logger; gracePeriodMs: number },
): Promise<void> {
  if (!server.listening) {
    return;
  }

  const closed = new Promise<void>((resolve, reject) => {
    server.close((error) => (error !== undefined ? reject(error) : resolve()));
  });
  server.closeIdleConnections();

  const timeout = setTimeout(() => {
    log.warn('Grace period elapsed, closing remaining connections', {
      gracePeriodMs,
    });
    server.closeAllConnections();
  }, gracePeriodMs);

  try {
    await closed;
  } finally {
    clearTimeout(timeout);
  }
}
