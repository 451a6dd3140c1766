// morphseg/log - Debug logging

export let DEBUG = false;

export function setDebug(value: boolean) {
  DEBUG = value;
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
