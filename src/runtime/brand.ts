/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves it went through a parser at a boundary
 * (for example `parseArtifactPath`). Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
