/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';

import type { IssuedCertificate } from '../src/types.js';

function readFixture(name: string): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

/**
 * Self-signed certificate and key for fixture.example.com, valid until
 * 2036-10-15T20:44:32Z.
 */
export const FIXTURE_HOSTNAME = 'fixture.example.com';
export const FIXTURE_NOT_AFTER = new Date('2036-10-15T20:44:32Z');

export function fixtureCertificate(): IssuedCertificate {
  return {
    key: readFixture('fixture.example.com.key.pem'),
    cert: readFixture('fixture.example.com.cert.pem'),
  };
}
