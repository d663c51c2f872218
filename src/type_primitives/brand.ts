/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime — it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: a LeaseKey and a raw slot index are both numbers at runtime,
 * but Brand<number, "lease_key"> cannot be passed where a plain index
 * was produced, or the other way round, without an explicit cast.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
