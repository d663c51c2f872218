import { describe, expect, it } from "vitest";
import {
  LeaseMap,
  LEASE_ERROR,
  SLOT,
  as_lease_key,
  get_key_index,
  is_lease_error,
  is_occupied_slot,
} from "../index";

describe("public surface", () => {
  it("a key serialized as a number resolves after a round trip", () => {
    const map = new LeaseMap<string>();
    map.insert("a");
    const key = map.insert("b");

    const restored = as_lease_key(Number(String(key)));

    expect(get_key_index(restored)).toBe(1);
    expect(map.get(restored)).toBe("b");
  });

  it("capacity errors are recognisable by category", () => {
    const map = new LeaseMap<number>({ max_capacity: 1 });
    map.insert(1);
    try {
      map.insert(2);
      expect.unreachable();
    } catch (e) {
      expect(is_lease_error(e) && e.category).toBe(
        LEASE_ERROR.CAPACITY_EXCEEDED,
      );
    }
  });

  it("slot views narrow by tag", () => {
    const map = new LeaseMap<string>();
    map.insert("a");
    const slot = map.slot(0);
    expect(slot?.tag).toBe(SLOT.OCCUPIED);
    expect(slot !== undefined && is_occupied_slot(slot) && slot.value).toBe(
      "a",
    );
  });
});
