// Typed property types - the statically declared part of the state

/**
 * Kinds a typed property can declare.
 *
 * `decimalFloat` reads as a float and is written with decimal precision
 * (15 significant digits).
 */
export type PropertyKind = 'string' | 'boolean' | 'integer' | 'float' | 'decimalFloat';

/**
 * Native type carried by each property kind.
 */
export type PropertyNativeTypes = {
  string: string;
  boolean: boolean;
  integer: number;
  float: number;
  decimalFloat: number;
};

/**
 * A single declared property of kind K.
 * Declarations missing either accessor are excluded from the registry.
 */
export type PropertyDeclarationOf<TState, K extends PropertyKind> = {
  /**
   * Declared name, exact casing. Used as the snapshot key.
   */
  name: string;

  kind: K;

  get?: (state: TState) => PropertyNativeTypes[K];

  set?: (state: TState, value: PropertyNativeTypes[K]) => void;
};

/**
 * A typed property declaration of any supported kind.
 */
export type PropertyDeclaration<TState> = {
  [K in PropertyKind]: PropertyDeclarationOf<TState, K>;
}[PropertyKind];

/**
 * The full static declaration table for a state object.
 */
export type PropertySchema<TState> = readonly PropertyDeclaration<TState>[];

/**
 * A registered typed property: a declaration with both accessors,
 * keyed by its normalized (lowercased) name.
 */
export type TypedPropertyOf<TState, K extends PropertyKind> = Readonly<
  Required<PropertyDeclarationOf<TState, K>>
> & {
  readonly normalizedName: string;
};

export type TypedProperty<TState> = {
  [K in PropertyKind]: TypedPropertyOf<TState, K>;
}[PropertyKind];
