// @appstate/runtime
// Application state container: typed properties and dynamic variables
// behind one name-based get/set protocol.

// State container
export {
  AppState,
  createAppState,
  type AppStateOptions,
  type CreateAppStateOptions,
} from './state/app-state.js';

export { readProperty, writeProperty, asDecimal, DECIMAL_PRECISION } from './state/dispatch.js';

export { normalizeName } from './names.js';

// Values
export {
  stringValue,
  booleanValue,
  integerValue,
  floatValue,
  toValue,
  narrowToInteger,
  asString,
  asBoolean,
  asInteger,
  asFloat,
  valuesEqual,
} from './values/index.js';

// Typed properties
export { TypedPropertyRegistry } from './properties/registry.js';
export {
  appPropertySchema,
  createDefaultProperties,
  type AppProperties,
} from './properties/schema.js';

// Variables and change notification
export { VariableStore } from './variables/store.js';
export {
  ChangeNotifier,
  isChangeOfType,
  describeChange,
  logVariableChanges,
  type ChangeSource,
  type ChangeNotifierOptions,
  type SubscriptionHandle,
} from './events/index.js';

// Snapshot
export {
  propertiesToDocument,
  propertiesToJson,
  variablesToDocument,
  variablesToJson,
  fromJson,
} from './snapshot/json.js';

// Host words
export {
  registerStateWords,
  popValue,
  popName,
  WORD_NAMES,
  type Word,
  type WordHost,
  type ScriptSource,
  type StateWordsOptions,
} from './host/words.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type StateLogger,
  type LogEntry,
} from './logging.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  InvalidNameError,
  NotFoundError,
  CoercionError,
  UnsupportedCoercionError,
  InvalidOperationError,
  NotSupportedError,
  DuplicatePropertyError,
  ChangeHandlerError,
} from './errors.js';
