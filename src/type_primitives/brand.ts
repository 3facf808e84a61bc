/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only stops
 * a raw number from being passed where a checked one is expected.
 *
 * Example: Capacity and SlotIndex are both numbers at runtime, but
 * Brand<number, "capacity"> and Brand<number, "slot_index"> are
 * incompatible at compile time.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
