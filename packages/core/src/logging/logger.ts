import createDebug from 'debug';
import type { Debugger } from 'debug';

/**
 * Root namespace for all diagnostics. Enable with `DEBUG=pinion:*`.
 */
const root = createDebug('pinion');

const loggers = new Map<string, Debugger>();

/**
 * Get the namespaced logger for a component (`pinion:<component>`).
 * Instances are cached so `enabled` toggles stick per namespace.
 */
export function logger(component: string): Debugger {
  let instance = loggers.get(component);
  if (!instance) {
    instance = root.extend(component);
    loggers.set(component, instance);
  }
  return instance;
}
