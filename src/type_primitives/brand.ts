/***
 * Brand — Ids that cannot be mixed up.
 *
 * An EntityID is a string and a SystemID a number, so without help any
 * string or number would type-check where one of them is expected.
 * Brand<T, Name> adds a property that exists only for the compiler;
 * values get the brand by passing through validate_and_cast().
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
