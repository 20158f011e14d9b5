/**
 * Runtime Type Guards
 *
 * Narrowing functions for matchpool domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, external integrations).
 */

import type { Coin } from "./coin.js";
import type { Expiration } from "./chain.js";

const UINT_PATTERN = /^(0|[1-9]\d*)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Coin guards
// =============================================================================

export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_PATTERN.test(value);
}

export function isCoin(value: unknown): value is Coin {
  if (!isRecord(value)) return false;
  return (
    typeof value.denom === "string" &&
    value.denom.length > 0 &&
    isUintString(value.amount)
  );
}

// =============================================================================
// Chain guards
// =============================================================================

export function isExpiration(value: unknown): value is Expiration {
  if (!isRecord(value)) return false;
  const keys = Object.keys(value);
  if (keys.length !== 1) return false;

  if ("atHeight" in value) {
    return typeof value.atHeight === "number" && Number.isInteger(value.atHeight) && value.atHeight >= 0;
  }
  if ("atTime" in value) {
    return isUintString(value.atTime);
  }
  return value.never === true;
}
