/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as acme from 'acme-client';

import type { IssuedCertificate } from '../types.js';

const PRIVATE_KEY_REGEX =
  /-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----[\s\S]+?-----END (?:[A-Z]+ )?PRIVATE KEY-----/;
const CERTIFICATE_REGEX =
  /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Stored layout: the PEM private key followed by the PEM chain, leaf first.
 */
export function encodeCertBundle({ key, cert }: IssuedCertificate): Buffer {
  return Buffer.from(`${key.trim()}\n${cert.trim()}\n`, 'utf8');
}

export function decodeCertBundle(data: Buffer): IssuedCertificate | undefined {
  const pem = data.toString('utf8');

  const key = PRIVATE_KEY_REGEX.exec(pem)?.[0];
  const certs = pem.match(CERTIFICATE_REGEX);
  if (key === undefined || certs === null) {
    return undefined;
  }

  return { key, cert: certs.join('\n') };
}

export function certificateNotAfter(cert: string): Date {
  return acme.crypto.readCertificateInfo(cert).notAfter;
}
