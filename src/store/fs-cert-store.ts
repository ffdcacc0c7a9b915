/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fse from 'fs-extra';
import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

import type { CertificateCache, SignalOptions } from '../types.js';

// Hostnames plus the characters used by non-domain keys (acme_account+key)
const VALID_KEY_REGEX = /^[a-zA-Z0-9._+-]+$/;

/**
 * Certificate material stored as one file per key under a directory.
 */
export class FsCertStore implements CertificateCache {
  private baseDir: string;
  private tmpDir: string;

  constructor({ baseDir, tmpDir }: { baseDir: string; tmpDir?: string }) {
    this.baseDir = baseDir;
    this.tmpDir = tmpDir ?? path.join(baseDir, '.tmp');
    fs.mkdirSync(this.baseDir, { recursive: true, mode: 0o700 });
    fs.mkdirSync(this.tmpDir, { recursive: true, mode: 0o700 });
  }

  private certPath(key: string): string {
    if (!VALID_KEY_REGEX.test(key) || key === '.' || key === '..') {
      throw new Error(`Invalid certificate cache key: ${JSON.stringify(key)}`);
    }
    return path.join(this.baseDir, key);
  }

  async get(
    key: string,
    { signal }: SignalOptions = {},
  ): Promise<Buffer | undefined> {
    try {
      return await fs.promises.readFile(this.certPath(key), { signal });
    } catch (error) {
      if (
        error instanceof Error &&
        'code' in error &&
        error.code === 'ENOENT'
      ) {
        return undefined;
      }
      throw error;
    }
  }

  async put(
    key: string,
    data: Buffer,
    { signal }: SignalOptions = {},
  ): Promise<void> {
    const finalPath = this.certPath(key);

    // Write to a temporary file first so readers never see a partial file
    const tmpPath = path.join(
      this.tmpDir,
      `${key}.${crypto.randomBytes(6).toString('hex')}`,
    );
    try {
      await fs.promises.writeFile(tmpPath, data, { mode: 0o600, signal });
      signal?.throwIfAborted();
      await fse.move(tmpPath, finalPath, { overwrite: true });
    } catch (error) {
      await fse.remove(tmpPath);
      throw error;
    }
  }

  async delete(key: string, { signal }: SignalOptions = {}): Promise<void> {
    signal?.throwIfAborted();
    await fse.remove(this.certPath(key));
  }
}
