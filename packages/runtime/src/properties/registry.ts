// Typed property registry - maps normalized names to declared properties

import type {
  PropertyDeclaration,
  PropertyDeclarationOf,
  PropertyKind,
  PropertySchema,
  TypedProperty,
} from '@appstate/protocol';
import { isValidName } from '@appstate/protocol';
import { DuplicatePropertyError, InvalidNameError } from '../errors.js';

type CompleteDeclaration<TState> = {
  [K in PropertyKind]: Required<PropertyDeclarationOf<TState, K>>;
}[PropertyKind];

function hasAccessors<TState>(
  declaration: PropertyDeclaration<TState>
): declaration is CompleteDeclaration<TState> {
  return declaration.get !== undefined && declaration.set !== undefined;
}

/**
 * Registry of typed properties.
 *
 * The table is built from the static declaration list on first use and
 * cached for the registry's lifetime. There is no invalidation: the
 * schema is fixed at construction. Declarations without both a getter
 * and a setter are left out.
 */
export class TypedPropertyRegistry<TState> {
  private readonly declarations: PropertySchema<TState>;
  private table: Map<string, TypedProperty<TState>> | null = null;

  constructor(declarations: PropertySchema<TState>) {
    this.declarations = declarations;
  }

  /**
   * Look up a property by normalized name.
   *
   * @param normalizedName - Lowercased name
   * @returns The property, or undefined if no declared property has that name
   */
  resolve(normalizedName: string): TypedProperty<TState> | undefined {
    return this.getTable().get(normalizedName);
  }

  /**
   * Check if a normalized name belongs to a typed property.
   */
  has(normalizedName: string): boolean {
    return this.getTable().has(normalizedName);
  }

  /**
   * Get all registered properties in declaration order.
   */
  list(): TypedProperty<TState>[] {
    return Array.from(this.getTable().values());
  }

  /**
   * Whether the table has been built yet.
   */
  get isBuilt(): boolean {
    return this.table !== null;
  }

  private getTable(): Map<string, TypedProperty<TState>> {
    if (this.table === null) {
      this.table = buildTable(this.declarations);
    }
    return this.table;
  }
}

function buildTable<TState>(
  declarations: PropertySchema<TState>
): Map<string, TypedProperty<TState>> {
  const table = new Map<string, TypedProperty<TState>>();

  for (const declaration of declarations) {
    if (!hasAccessors(declaration)) {
      continue;
    }

    if (!isValidName(declaration.name)) {
      throw new InvalidNameError(declaration.name);
    }

    const normalizedName = declaration.name.toLowerCase();
    const existing = table.get(normalizedName);
    if (existing) {
      throw new DuplicatePropertyError(normalizedName, existing.name, declaration.name);
    }

    const property: TypedProperty<TState> = { ...declaration, normalizedName };
    table.set(normalizedName, property);
  }

  return table;
}
