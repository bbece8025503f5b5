// Application state container
//
// One name-based protocol over two kinds of state: typed properties from
// a static declaration table, and dynamic variables created at runtime.
// Typed properties always take precedence, so a variable can never shadow one.
//
// The container is meant for one control thread. All operations are
// synchronous; embedders that share an instance must serialize calls.

import type {
  PropertySchema,
  Value,
  ValueInput,
  VariableChangeEvent,
  VariableChangeHandler,
  VariableChangeType,
} from '@appstate/protocol';
import type { StateLogger } from '../logging.js';
import { consoleLogger } from '../logging.js';
import { TypedPropertyRegistry } from '../properties/registry.js';
import {
  appPropertySchema,
  createDefaultProperties,
  type AppProperties,
} from '../properties/schema.js';
import { VariableStore } from '../variables/store.js';
import { ChangeNotifier, type SubscriptionHandle } from '../events/notifier.js';
import { propertiesToJson, variablesToJson } from '../snapshot/json.js';
import { readProperty, writeProperty } from './dispatch.js';
import { normalizeName } from '../names.js';
import { toValue } from '../values/value.js';
import { InvalidOperationError, NotFoundError } from '../errors.js';

/**
 * Options for creating an application state
 */
export type AppStateOptions<TState extends object> = {
  /**
   * The object holding typed property values
   */
  properties: TState;

  /**
   * Declaration table for the typed properties
   */
  schema: PropertySchema<TState>;

  /**
   * Logger for handler failures (defaults to console)
   */
  logger?: StateLogger;

  /**
   * Whether change notification continues after a handler throws (default: true)
   */
  continueOnError?: boolean;
};

export class AppState<TState extends object = AppProperties> {
  readonly properties: TState;
  readonly registry: TypedPropertyRegistry<TState>;
  readonly logger: StateLogger;
  private readonly notifier: ChangeNotifier;
  private readonly variables: VariableStore;

  constructor(options: AppStateOptions<TState>) {
    this.properties = options.properties;
    this.logger = options.logger ?? consoleLogger;
    this.registry = new TypedPropertyRegistry(options.schema);
    this.notifier = new ChangeNotifier({
      logger: this.logger,
      continueOnError: options.continueOnError,
    });
    this.variables = new VariableStore(this.notifier);
  }

  /**
   * Get a typed property or variable.
   *
   * @param name - Any casing; must not be empty or whitespace-only
   * @param defaultValue - Returned when nothing has that name
   * @throws InvalidNameError for an empty or whitespace-only name
   * @throws NotFoundError when nothing has that name and no default was given
   */
  get(name: string, defaultValue?: ValueInput): Value {
    const value = this.tryGet(name);
    if (value !== undefined) {
      return value;
    }
    if (defaultValue !== undefined) {
      return toValue(defaultValue);
    }
    throw new NotFoundError(normalizeName(name));
  }

  /**
   * Get a typed property or variable, or undefined if neither exists.
   */
  tryGet(name: string): Value | undefined {
    const normalizedName = normalizeName(name);

    const property = this.registry.resolve(normalizedName);
    if (property) {
      return readProperty(property, this.properties);
    }

    return this.variables.get(normalizedName);
  }

  /**
   * Check if a name is a typed property or a defined variable.
   */
  has(name: string): boolean {
    const normalizedName = normalizeName(name);
    return this.registry.has(normalizedName) || this.variables.has(normalizedName);
  }

  /**
   * Check if a name is reserved by a typed property.
   */
  isTypedProperty(name: string): boolean {
    return this.registry.has(normalizeName(name));
  }

  /**
   * Set a typed property or variable.
   *
   * A typed property receives the value coerced to its declared kind.
   * Any other name creates or replaces a variable; null or undefined
   * removes it. On failure nothing is changed.
   *
   * @throws InvalidNameError for an empty or whitespace-only name
   * @throws CoercionError when the value does not fit the property's kind
   * @throws UnsupportedCoercionError when the property's kind is not supported
   * @throws InvalidOperationError when removing a typed property
   */
  set(name: string, value: ValueInput | null | undefined): void {
    const normalizedName = normalizeName(name);

    const property = this.registry.resolve(normalizedName);
    if (property) {
      if (value === null || value === undefined) {
        throw new InvalidOperationError(`Property '${property.name}' cannot be removed.`);
      }
      writeProperty(property, this.properties, toValue(value));
      return;
    }

    this.variables.set(
      normalizedName,
      value === null || value === undefined ? null : toValue(value)
    );
  }

  /**
   * Remove a variable. A no-op when the variable does not exist.
   *
   * @throws InvalidOperationError when the name is a typed property
   */
  remove(name: string): void {
    this.set(name, null);
  }

  /**
   * Register a handler for every variable change.
   */
  subscribe(handler: VariableChangeHandler): SubscriptionHandle {
    return this.notifier.subscribe(handler);
  }

  /**
   * Register a handler for one kind of variable change.
   */
  on<T extends VariableChangeType>(
    type: T,
    handler: VariableChangeHandler<Extract<VariableChangeEvent, { type: T }>>
  ): SubscriptionHandle {
    return this.notifier.on(type, handler);
  }

  unsubscribe(handle: SubscriptionHandle): boolean {
    return this.notifier.unsubscribe(handle);
  }

  /**
   * Declared names of all typed properties, in declaration order.
   */
  propertyNames(): string[] {
    return this.registry.list().map((property) => property.name);
  }

  /**
   * Normalized names of all variables, in insertion order.
   */
  variableNames(): string[] {
    return this.variables.names();
  }

  /**
   * Name/value pairs of all variables, in insertion order.
   */
  variableEntries(): [string, Value][] {
    return this.variables.entries();
  }

  /**
   * Typed properties as pretty-printed JSON with string values.
   */
  toJson(): string {
    return propertiesToJson(this.registry, this.properties);
  }

  /**
   * Variables as pretty-printed JSON with string values.
   */
  variablesToJson(): string {
    return variablesToJson(this.variables);
  }
}

/**
 * Options for the default application state
 */
export type CreateAppStateOptions = {
  /**
   * Overrides for the default property values
   */
  properties?: Partial<AppProperties>;
  logger?: StateLogger;
  continueOnError?: boolean;
};

/**
 * Create an application state with the default property set.
 */
export function createAppState(options: CreateAppStateOptions = {}): AppState<AppProperties> {
  return new AppState({
    properties: createDefaultProperties(options.properties),
    schema: appPropertySchema,
    logger: options.logger,
    continueOnError: options.continueOnError,
  });
}
