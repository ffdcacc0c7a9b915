/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';
import log from '../src/log.js';

/**
 * Create a child of the main logger tagged with the test suite and case.
 * Under the test runner the main logger writes to logs/test.log.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger({ suite: 'RateLimitedCertStore' });
 * ```
 */
export function createTestLogger(options?: {
  suite?: string;
  test?: string;
  metadata?: Record<string, unknown>;
}): winston.Logger {
  const { suite, test, metadata = {} } = options ?? {};

  return log.child({
    ...metadata,
    ...(suite !== undefined && { testSuite: suite }),
    ...(test !== undefined && { testCase: test }),
  });
}
