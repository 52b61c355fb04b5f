// A Type is the static type of an SPL term.
// Numeric is the only type a variable can hold; Boolean values exist
// only while a condition is evaluated.
export enum Type {
  Unknown = 'unknown',
  Numeric = 'numeric',
  Boolean = 'boolean',
}

// unify returns the common type of a and b, or null if they are two
// different concrete types. Unknown unifies with anything.
export function unify(a: Type, b: Type): Type | null {
  if (a === Type.Unknown) {
    return b;
  }
  if (b === Type.Unknown || a === b) {
    return a;
  }
  return null;
}
