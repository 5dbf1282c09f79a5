// ═══════════════════════════════════════════════════════
// state.ts — Process-wide pipeline state
// The cached loader is the only shared mutable state. It is created
// explicitly at startup and reached through getPropertyLoader().
// ═══════════════════════════════════════════════════════
import { PropertyLoader, type PropertyLoaderOptions } from './loader.ts';
import type { PropertySource } from './dal.ts';

let propertyLoader: PropertyLoader | null = null;

export function initPropertyLoader(source: PropertySource, opts: PropertyLoaderOptions): PropertyLoader {
  propertyLoader = new PropertyLoader(source, opts);
  return propertyLoader;
}

export function getPropertyLoader(): PropertyLoader {
  if (!propertyLoader) throw new Error('Property loader not initialized; call initPropertyLoader() at startup');
  return propertyLoader;
}

export function resetPropertyLoader(): void {
  propertyLoader = null;
}
