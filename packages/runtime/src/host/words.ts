// Scripting host words
//
// Binds the state container to an interpreter through a minimal port.
// The interpreter owns the stack; stack items arrive as unknown data and
// are validated before they reach the container.

import type { Value } from '@appstate/protocol';
import { validateValueInput } from '@appstate/protocol';
import type { AppState } from '../state/app-state.js';
import type { StateLogger } from '../logging.js';
import { asBoolean, asString, stringValue, toValue } from '../values/value.js';
import { NotFoundError, ValidationError } from '../errors.js';

/**
 * A primitive word. Reads its arguments from the host stack and pushes results.
 */
export type Word = (host: WordHost) => void;

/**
 * The part of an interpreter the state words need.
 */
export type WordHost = {
  pop(): unknown;
  push(value: Value): void;
  define(name: string, word: Word): void;
  interpret(source: string): void;
};

/**
 * Where INCLUDE-SCRIPT finds script text.
 */
export type ScriptSource = {
  exists(path: string): boolean;
  read(path: string): string;
};

/**
 * Options for registering the state words
 */
export type StateWordsOptions = {
  /**
   * Logger for DEBUG output (defaults to the state's logger)
   */
  logger?: StateLogger;

  /**
   * Script source for INCLUDE-SCRIPT. The word is not registered without one.
   */
  scripts?: ScriptSource;

  /**
   * Name of the boolean that switches DEBUG output on (default: DebugEnabled)
   */
  debugFlag?: string;
};

export const WORD_NAMES = {
  get: 'GET',
  set: 'SET',
  removeVariable: 'REMOVE-VARIABLE',
  getAppStateJson: 'GET-APP-STATE-JSON',
  debug: 'DEBUG',
  includeScript: 'INCLUDE-SCRIPT',
} as const;

const DEFAULT_DEBUG_FLAG = 'DebugEnabled';

/**
 * Pop one item and validate it as a value.
 *
 * @throws ValidationError if the item is not a value
 */
export function popValue(host: WordHost, word: string): Value {
  const item = host.pop();
  const result = validateValueInput(item);
  if (!result.valid) {
    throw new ValidationError(`${word} expects a value on the stack`, {
      field: 'stack',
      details: { word, errors: result.errors },
    });
  }
  return toValue(result.value);
}

/**
 * Pop one item and read it as a name.
 */
export function popName(host: WordHost, word: string): string {
  return asString(popValue(host, word));
}

/**
 * Define the state words on a host.
 *
 * @returns The names of the words that were defined
 */
export function registerStateWords<TState extends object>(
  host: WordHost,
  state: AppState<TState>,
  options: StateWordsOptions = {}
): string[] {
  const logger = options.logger ?? state.logger;
  const debugFlag = options.debugFlag ?? DEFAULT_DEBUG_FLAG;
  const defined: string[] = [];

  const define = (name: string, word: Word) => {
    host.define(name, word);
    defined.push(name);
  };

  // GET ( name -- value )
  define(WORD_NAMES.get, (h) => {
    const name = popName(h, WORD_NAMES.get);
    h.push(state.get(name));
  });

  // SET ( value name -- )
  define(WORD_NAMES.set, (h) => {
    const name = popName(h, WORD_NAMES.set);
    const value = popValue(h, WORD_NAMES.set);
    state.set(name, value);
  });

  // REMOVE-VARIABLE ( name -- )
  define(WORD_NAMES.removeVariable, (h) => {
    state.remove(popName(h, WORD_NAMES.removeVariable));
  });

  // GET-APP-STATE-JSON ( -- json )
  define(WORD_NAMES.getAppStateJson, (h) => {
    h.push(stringValue(state.toJson()));
  });

  // DEBUG ( value -- )
  define(WORD_NAMES.debug, (h) => {
    const value = popValue(h, WORD_NAMES.debug);
    if (asBoolean(state.get(debugFlag, false))) {
      logger.debug(`Debug: ${asString(value)}`);
    }
  });

  const scripts = options.scripts;
  if (scripts) {
    // INCLUDE-SCRIPT ( path -- )
    define(WORD_NAMES.includeScript, (h) => {
      const path = popName(h, WORD_NAMES.includeScript);
      if (!scripts.exists(path)) {
        throw new NotFoundError(path, `Script '${path}' does not exist.`);
      }
      h.interpret(scripts.read(path));
    });
  }

  return defined;
}
