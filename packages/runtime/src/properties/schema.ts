// Default application properties
//
// The fixed set of typed properties an application state carries
// unless the embedder supplies its own schema.

import type { PropertySchema } from '@appstate/protocol';

export type AppProperties = {
  appName: string;
  appVersion: string;
  debugEnabled: boolean;
  intValue: number;
  floatValue: number;
  doubleValue: number;
  decimalValue: number;
};

/**
 * Create the default property values. An override left undefined keeps its default.
 */
export function createDefaultProperties(overrides: Partial<AppProperties> = {}): AppProperties {
  return {
    appName: overrides.appName ?? 'App',
    appVersion: overrides.appVersion ?? '1.0.0',
    debugEnabled: overrides.debugEnabled ?? false,
    intValue: overrides.intValue ?? 1,
    floatValue: overrides.floatValue ?? 2.1,
    doubleValue: overrides.doubleValue ?? 3.4,
    decimalValue: overrides.decimalValue ?? 4.5,
  };
}

/**
 * Declaration table for AppProperties. Names keep their declared casing;
 * they are what the snapshot uses as keys.
 */
export const appPropertySchema: PropertySchema<AppProperties> = [
  {
    name: 'AppName',
    kind: 'string',
    get: (state) => state.appName,
    set: (state, value) => {
      state.appName = value;
    },
  },
  {
    name: 'AppVersion',
    kind: 'string',
    get: (state) => state.appVersion,
    set: (state, value) => {
      state.appVersion = value;
    },
  },
  {
    name: 'DebugEnabled',
    kind: 'boolean',
    get: (state) => state.debugEnabled,
    set: (state, value) => {
      state.debugEnabled = value;
    },
  },
  {
    name: 'IntValue',
    kind: 'integer',
    get: (state) => state.intValue,
    set: (state, value) => {
      state.intValue = value;
    },
  },
  {
    name: 'FloatValue',
    kind: 'float',
    get: (state) => state.floatValue,
    set: (state, value) => {
      state.floatValue = value;
    },
  },
  {
    name: 'DoubleValue',
    kind: 'float',
    get: (state) => state.doubleValue,
    set: (state, value) => {
      state.doubleValue = value;
    },
  },
  {
    name: 'DecimalValue',
    kind: 'decimalFloat',
    get: (state) => state.decimalValue,
    set: (state, value) => {
      state.decimalValue = value;
    },
  },
];
