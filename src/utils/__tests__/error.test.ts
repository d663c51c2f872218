import { describe, expect, it } from "vitest";
import { AppError } from "utils/error";
import { LeaseError, LEASE_ERROR, is_lease_error } from "../error";

describe("LeaseError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new LeaseError(LEASE_ERROR.CAPACITY_EXCEEDED);
    expect(err.category).toBe(LEASE_ERROR.CAPACITY_EXCEEDED);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new LeaseError(LEASE_ERROR.INVALID_CAPACITY);
    expect(err.message).toBe(LEASE_ERROR.INVALID_CAPACITY);
  });

  it("uses provided message when given", () => {
    const err = new LeaseError(
      LEASE_ERROR.KEY_INDEX_OVERFLOW,
      "index exceeded limit",
    );
    expect(err.message).toBe("index exceeded limit");
  });

  it("is always operational", () => {
    const err = new LeaseError(LEASE_ERROR.INVALID_OPTION);
    expect(err.is_operational).toBe(true);
  });

  it("context is undefined when not provided", () => {
    const err = new LeaseError(LEASE_ERROR.CAPACITY_EXCEEDED);
    expect(err.context).toBeUndefined();
  });

  it("stores provided context", () => {
    const ctx = { max_capacity: 8 };
    const err = new LeaseError(LEASE_ERROR.CAPACITY_EXCEEDED, "full", ctx);
    expect(err.context).toEqual({ max_capacity: 8 });
  });

  it("sets name to LeaseError", () => {
    const err = new LeaseError(LEASE_ERROR.CAPACITY_EXCEEDED);
    expect(err.name).toBe("LeaseError");
  });

  //=========================================================
  // Inheritance
  //=========================================================

  it("is an instance of AppError", () => {
    const err = new LeaseError(LEASE_ERROR.KEY_GENERATION_OVERFLOW);
    expect(err).toBeInstanceOf(AppError);
  });

  it("is an instance of Error", () => {
    const err = new LeaseError(LEASE_ERROR.KEY_GENERATION_OVERFLOW);
    expect(err).toBeInstanceOf(Error);
  });

  //=========================================================
  // LEASE_ERROR enum values
  //=========================================================

  it("all LEASE_ERROR enum members are distinct strings", () => {
    const values = Object.values(LEASE_ERROR);
    const unique = new Set(values);
    expect(unique.size).toBe(values.length);
  });

  //=========================================================
  // is_lease_error guard
  //=========================================================

  it("is_lease_error returns true for LeaseError instances", () => {
    const err = new LeaseError(LEASE_ERROR.CAPACITY_EXCEEDED);
    expect(is_lease_error(err)).toBe(true);
  });

  it("is_lease_error returns false for plain Error", () => {
    expect(is_lease_error(new Error("plain"))).toBe(false);
  });

  it("is_lease_error returns false for non-error values", () => {
    expect(is_lease_error(null)).toBe(false);
    expect(is_lease_error(undefined)).toBe(false);
    expect(is_lease_error("string")).toBe(false);
    expect(is_lease_error(42)).toBe(false);
    expect(is_lease_error({})).toBe(false);
  });
});
