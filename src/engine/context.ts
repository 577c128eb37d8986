/**
 * Per-run state of a generation.
 *
 * @packageDocumentation
 */

import { AliasStore } from './alias-store.js';
import { ConstantCatalog } from './constant-catalog.js';

/**
 * Owns the registries of one generation run. Created empty at the start of
 * a run and dropped at its end.
 */
export interface GenerationContext {
  readonly catalog: ConstantCatalog;
  readonly aliases: AliasStore;
}

/**
 * Creates a context with empty registries.
 *
 * @returns A fresh context.
 */
export function createGenerationContext(): GenerationContext {
  return {
    catalog: new ConstantCatalog(),
    aliases: new AliasStore(),
  };
}
