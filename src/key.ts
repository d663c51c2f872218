/***
 * LeaseKey — Packed generational key (32-bit index | 21-bit generation).
 *
 * Each key encodes a slot index and the generation that slot had when the
 * key was issued. When a lease ends, the slot's generation increments, so
 * any key still carrying the previous generation no longer resolves, even
 * after the slot has been handed to a new tenant.
 *
 * Bitwise operators stop at 32 bits, so the two halves are combined with
 * arithmetic. The packed value stays below 2^53 and is an exact integer.
 *
 * Layout: [generation:21][index:32]
 *
 *   create_lease_key(index, gen) → gen * 2^32 + index
 *   get_key_index(key)           → key % 2^32
 *   get_key_generation(key)      → floor(key / 2^32)
 *
 ***/

import {
  type Brand,
  is_safe_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";
import { LEASE_ERROR, LeaseError } from "./utils/error";
import {
  INDEX_RANGE,
  MAX_GENERATION,
  MAX_INDEX,
} from "./utils/constants";

export type LeaseKey = Brand<number, "lease_key">;

export const create_lease_key = (
  index: number,
  generation: number,
): LeaseKey => {
  if (__DEV__) {
    if (index < 0 || index > MAX_INDEX) {
      throw new LeaseError(LEASE_ERROR.KEY_INDEX_OVERFLOW, undefined, {
        index,
      });
    }

    if (generation < 0 || generation > MAX_GENERATION) {
      throw new LeaseError(LEASE_ERROR.KEY_GENERATION_OVERFLOW, undefined, {
        generation,
      });
    }
  }
  return unsafe_cast<LeaseKey>(generation * INDEX_RANGE + index);
};

/**
 * Brand a number obtained elsewhere (a serialized handle, a message id)
 * as a key. Validity against a particular map is still decided by lookup.
 */
export const as_lease_key = (value: number): LeaseKey =>
  validate_and_cast<number, LeaseKey>(
    value,
    is_safe_non_negative_integer,
    "LeaseKey must be a non-negative safe integer",
  );

export const get_key_index = (key: LeaseKey): number => key % INDEX_RANGE;

export const get_key_generation = (key: LeaseKey): number =>
  Math.floor(key / INDEX_RANGE);

export const keys_equal = (a: LeaseKey, b: LeaseKey): boolean => a === b;

/** Order by index, then generation. */
export const compare_keys = (a: LeaseKey, b: LeaseKey): number => {
  const index_delta = get_key_index(a) - get_key_index(b);
  if (index_delta !== 0) return index_delta;
  return get_key_generation(a) - get_key_generation(b);
};

/**
 * A slot at this generation cannot be bumped again without reissuing
 * keys it has already handed out, so it is retired on its next vacate.
 */
export const is_final_generation = (generation: number): boolean =>
  generation >= MAX_GENERATION;
