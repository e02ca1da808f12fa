import type { PortalAdapter } from './types.js';

/**
 * Typed helper for portal adapter definitions.
 */
export function definePortal<T extends PortalAdapter>(adapter: T): T {
  return adapter;
}
