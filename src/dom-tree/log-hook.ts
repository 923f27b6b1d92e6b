/**
 * In-page logging hook
 *
 * Forwards engine log lines to a function the hosting process exposed on the
 * page under `bindingName`, and writes to the console when there is none
 * (or when forwarding fails). Never throws.
 *
 * Shipped into the page as source text: keep it free of outside references.
 */

import type { DomTreeLogHook, DomTreeLogLevel } from './dom-tree.types.js';

export function createPageLogHook(bindingName: string): DomTreeLogHook {
  const consoleMethods: Record<DomTreeLogLevel, 'log' | 'debug' | 'warn' | 'error'> = {
    info: 'log',
    debug: 'debug',
    warning: 'warn',
    error: 'error',
  };

  function writeToConsole(level: DomTreeLogLevel, message: string): void {
    console[consoleMethods[level]](`[DOM Tree] ${message}`);
  }

  return (level, message) => {
    const binding: unknown = Reflect.get(globalThis, bindingName);
    if (typeof binding !== 'function') {
      writeToConsole(level, message);
      return;
    }

    try {
      const result: unknown = binding(level, message);
      if (result instanceof Promise) {
        void result.catch(() => writeToConsole(level, message));
      }
    } catch {
      writeToConsole(level, message);
    }
  };
}
