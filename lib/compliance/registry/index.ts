/**
 * Feed Source Registry
 *
 * Central registry for compliance feed adapters.
 */

import type { ComplianceSourceKey, SourceConfig } from "../types";
import type { ComplianceSourceAdapter, ComplianceAdapterFactory } from "../adapters/types";

// ============================================================================
// Registry State
// ============================================================================

const adapterFactories = new Map<ComplianceSourceKey, ComplianceAdapterFactory>();
const adapterInstances = new Map<ComplianceSourceKey, ComplianceSourceAdapter>();

// ============================================================================
// Registration
// ============================================================================

/**
 * Register an adapter factory for a source key.
 * Called at module initialization time.
 */
export function registerComplianceSource(
  key: ComplianceSourceKey,
  factory: ComplianceAdapterFactory
): void {
  adapterFactories.set(key, factory);
  adapterInstances.delete(key);
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * Get an adapter instance for a source key.
 * Creates the adapter on first access (lazy instantiation).
 */
export function getComplianceSource(key: ComplianceSourceKey): ComplianceSourceAdapter {
  let adapter = adapterInstances.get(key);
  if (adapter) {
    return adapter;
  }

  const factory = adapterFactories.get(key);
  if (!factory) {
    throw new Error(`No adapter registered for source key: ${key}`);
  }

  adapter = factory();
  adapterInstances.set(key, adapter);
  return adapter;
}

export function hasComplianceSource(key: string): key is ComplianceSourceKey {
  return listRegisteredSources().some((registered) => registered === key);
}

/**
 * List all registered source keys, in registration order.
 */
export function listRegisteredSources(): ComplianceSourceKey[] {
  return Array.from(adapterFactories.keys());
}

/**
 * List all sources with their basic info.
 */
export function listComplianceSources(): Array<{
  key: ComplianceSourceKey;
  displayName: string;
  config: SourceConfig;
}> {
  return listRegisteredSources().map((key) => {
    const adapter = getComplianceSource(key);
    return {
      key: adapter.key,
      displayName: adapter.displayName,
      config: adapter.config,
    };
  });
}

/**
 * Resolve requested source keys against the registry.
 * No request means every registered source; unknown keys are reported
 * back rather than silently dropped.
 */
export function resolveSourceKeys(requested?: readonly string[]): {
  keys: ComplianceSourceKey[];
  unknown: string[];
} {
  if (!requested || requested.length === 0) {
    return { keys: listRegisteredSources(), unknown: [] };
  }

  const keys: ComplianceSourceKey[] = [];
  const unknown: string[] = [];
  for (const key of requested) {
    if (hasComplianceSource(key)) {
      if (!keys.includes(key)) keys.push(key);
    } else {
      unknown.push(key);
    }
  }
  return { keys, unknown };
}
