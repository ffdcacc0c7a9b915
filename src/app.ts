/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express, { ErrorRequestHandler } from 'express';
import http from 'node:http';
import https from 'node:https';

import * as config from './config.js';
import { closeServer } from './lib/shutdown.js';
import log from './log.js';
import { createAbortSignalMiddleware } from './middleware/abort-signal.js';
import { createHealthRouter } from './routes/health.js';
import { createRedirectRouter } from './routes/redirect.js';
import * as system from './system.js';

const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  log.error('Unhandled request error', {
    hostname: req.hostname,
    path: req.originalUrl,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  if (res.headersSent) {
    next(error);
    return;
  }
  res.status(500).type('text/plain').send('Internal Server Error\n');
};

// HTTP server
const app = express();
app.disable('x-powered-by');
app.set('trust proxy', config.TRUST_PROXY);

app.use(createAbortSignalMiddleware());
app.use(createHealthRouter());
if (system.certManager !== undefined) {
  app.use(system.certManager.challengeMiddleware());
}
app.use(
  createRedirectRouter({
    log,
    txtLookup: system.txtLookup,
    fallbackUrl: config.FALLBACK_URL,
  }),
);
app.use(errorHandler);

function applyTimeouts(server: http.Server | https.Server) {
  server.requestTimeout = config.REQUEST_TIMEOUT_MS;
  server.headersTimeout = config.REQUEST_TIMEOUT_MS;
  server.setTimeout(config.REQUEST_TIMEOUT_MS);
}

function listen(
  name: string,
  server: http.Server | https.Server,
  port: number,
): void {
  applyTimeouts(server);
  server.on('error', (error) => {
    log.error('Server failed', {
      server: name,
      port,
      error: error.message,
    });
    system.shutdown(1).catch((shutdownError: unknown) => {
      log.error('Shutdown failed', { error: String(shutdownError) });
    });
  });
  server.listen(port, () => {
    log.info(`Listening on port ${port}`, { server: name });
  });
  system.registerCleanupHandler(`${name}-server`, () =>
    closeServer(server, {
      log,
      gracePeriodMs: config.SHUTDOWN_GRACE_PERIOD_MS,
    }),
  );
}

if (system.certManager === undefined) {
  listen('http', http.createServer(app), config.PORT);
} else {
  // Plain HTTP stays up for HTTP-01 challenges and redirects
  listen('http', http.createServer(app), config.HTTP_PORT);
  listen(
    'https',
    https.createServer({ SNICallback: system.certManager.sniCallback }, app),
    config.HTTPS_PORT,
  );
}
