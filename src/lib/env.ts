/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Read a non-negative integer, failing loudly on anything else so a typo in
 * the environment does not silently become NaN.
 */
export function intOrDefault(envVarName: string, defaultValue: number): number {
  const raw = varOrUndefined(envVarName);
  if (raw === undefined) {
    return defaultValue;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(
      `${envVarName} must be a non-negative integer, got: ${JSON.stringify(raw)}`,
    );
  }
  return value;
}

export function listOrUndefined(envVarName: string): string[] | undefined {
  const raw = varOrUndefined(envVarName);
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  return items.length > 0 ? items : undefined;
}
