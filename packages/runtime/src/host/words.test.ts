// Tests for the scripting host words

import { describe, it, expect } from 'vitest';
import type { Value } from '@appstate/protocol';
import type { ScriptSource, Word, WordHost } from './words.js';
import { registerStateWords } from './words.js';
import { createAppState } from '../state/app-state.js';
import { createCapturingLogger, silentLogger } from '../logging.js';
import { integerValue, stringValue } from '../values/value.js';
import { NotFoundError, ValidationError } from '../errors.js';

// --- Test Fixtures ---

type FakeHost = WordHost & {
  stack: unknown[];
  words: Map<string, Word>;
};

/**
 * Whitespace-separated tokens. Defined words run, digit tokens push
 * integers and anything else pushes a string.
 */
function createFakeHost(): FakeHost {
  const stack: unknown[] = [];
  const words = new Map<string, Word>();

  const host: FakeHost = {
    stack,
    words,
    pop: () => stack.pop(),
    push: (value: Value) => {
      stack.push(value);
    },
    define: (name, word) => {
      words.set(name, word);
    },
    interpret: (source) => {
      for (const token of source.split(/\s+/).filter((t) => t.length > 0)) {
        const word = words.get(token);
        if (word) {
          word(host);
        } else if (/^-?\d+$/.test(token)) {
          stack.push(integerValue(Number(token)));
        } else {
          stack.push(stringValue(token));
        }
      }
    },
  };

  return host;
}

function createScripts(files: Record<string, string>): ScriptSource {
  const table = new Map(Object.entries(files));
  return {
    exists: (path) => table.has(path),
    read: (path) => table.get(path) ?? '',
  };
}

// --- Tests ---

describe('registerStateWords', () => {
  it('should define the core words without a script source', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });

    const names = registerStateWords(host, state);

    expect(names).toEqual(['GET', 'SET', 'REMOVE-VARIABLE', 'GET-APP-STATE-JSON', 'DEBUG']);
    expect(host.words.has('INCLUDE-SCRIPT')).toBe(false);
  });

  it('should define INCLUDE-SCRIPT when a script source is given', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });

    const names = registerStateWords(host, state, { scripts: createScripts({}) });

    expect(names).toContain('INCLUDE-SCRIPT');
    expect(host.words.has('INCLUDE-SCRIPT')).toBe(true);
  });
});

describe('state words', () => {
  it('should set and get a variable', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state);

    host.interpret('10 score SET score GET');

    expect(host.stack).toEqual([integerValue(10)]);
    expect(state.get('SCORE')).toEqual(integerValue(10));
  });

  it('should coerce into typed properties', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state);

    host.interpret('Editor AppName SET 7 IntValue SET');

    expect(state.properties.appName).toBe('Editor');
    expect(state.properties.intValue).toBe(7);
    expect(host.stack).toEqual([]);
  });

  it('should remove a variable', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state);

    host.interpret('3 lives SET lives REMOVE-VARIABLE');

    expect(state.has('lives')).toBe(false);
  });

  it('should push the property snapshot', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state);

    host.interpret('GET-APP-STATE-JSON');

    expect(host.stack).toEqual([stringValue(state.toJson())]);
  });

  it('should propagate a missing name from GET', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state);

    expect(() => host.interpret('ghost GET')).toThrow(NotFoundError);
  });

  it('should reject stack items that are not values', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state);
    host.stack.push({ unexpected: true });

    expect(() => host.interpret('GET')).toThrow(ValidationError);
    expect(() => host.interpret('SET')).toThrow('SET expects a value on the stack');
  });
});

describe('DEBUG', () => {
  it('should stay quiet while debugging is off', () => {
    const host = createFakeHost();
    const logger = createCapturingLogger();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state, { logger });

    host.interpret('hello DEBUG');

    expect(logger.entries).toEqual([]);
    expect(host.stack).toEqual([]);
  });

  it('should log at debug level once debugging is on', () => {
    const host = createFakeHost();
    const logger = createCapturingLogger();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state, { logger });

    host.interpret('true DebugEnabled SET hello DEBUG 42 DEBUG');

    expect(logger.entries.map((entry) => [entry.level, entry.message])).toEqual([
      ['debug', 'Debug: hello'],
      ['debug', 'Debug: 42'],
    ]);
  });

  it('should read a custom debug flag', () => {
    const host = createFakeHost();
    const logger = createCapturingLogger();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state, { logger, debugFlag: 'verbose' });

    host.interpret('hidden DEBUG 1 verbose SET shown DEBUG');

    expect(logger.entries.map((entry) => entry.message)).toEqual(['Debug: shown']);
  });
});

describe('INCLUDE-SCRIPT', () => {
  it('should interpret the script text', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    const scripts = createScripts({ 'init.fs': '5 lives SET Loaded AppName SET' });
    registerStateWords(host, state, { scripts });

    host.interpret('init.fs INCLUDE-SCRIPT');

    expect(state.get('lives')).toEqual(integerValue(5));
    expect(state.properties.appName).toBe('Loaded');
  });

  it('should throw NotFoundError for a missing script', () => {
    const host = createFakeHost();
    const state = createAppState({ logger: silentLogger });
    registerStateWords(host, state, { scripts: createScripts({}) });

    expect(() => host.interpret('nope.fs INCLUDE-SCRIPT')).toThrow(NotFoundError);
    expect(() => host.interpret('nope.fs INCLUDE-SCRIPT')).toThrow(
      "Script 'nope.fs' does not exist."
    );
  });
});
