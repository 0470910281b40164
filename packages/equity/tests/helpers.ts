/**
 * Shared helpers for equity tests.
 */

import { expect } from "vitest";
import type { Address } from "@mintsplit/types";
import { EquityError } from "../src/types.js";
import type { EquityErrorCode } from "../src/types.js";

/** A digits-only address, unchanged by checksumming. */
export function addr(n: number): Address {
  return `0x${String(n).padStart(40, "0")}`;
}

/** Three payees of three addresses each: addr(1..3), addr(4..6), addr(7..9). */
export const PAYEES: readonly (readonly Address[])[] = [
  [addr(1), addr(2), addr(3)],
  [addr(4), addr(5), addr(6)],
  [addr(7), addr(8), addr(9)],
];

export const SHARES: readonly bigint[] = [100n, 75n, 100n];

export const OUTSIDER = addr(99);

export function expectEquityError(fn: () => unknown, code: EquityErrorCode): EquityError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(EquityError);
    if (err instanceof EquityError) {
      expect(err.code).toBe(code);
      return err;
    }
  }
  throw new Error(`Expected EquityError ${code}`);
}

export async function expectRejection(
  promise: Promise<unknown>,
  code: EquityErrorCode,
): Promise<EquityError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(EquityError);
  if (err instanceof EquityError) {
    expect(err.code).toBe(code);
    return err;
  }
  throw new Error(`Expected EquityError ${code}`);
}
