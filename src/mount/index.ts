// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Mount Module
 *
 * - providers.ts - Subtree providers (static, cascading)
 * - registry.ts  - Composition of providers into one master tree
 */

export { StaticDomProvider, CascadingProvider } from './providers.js';
export type { DomProvider, ProviderLoad, CascadingProviderOptions } from './providers.js';
export { MountRegistry } from './registry.js';
export type {
  SchemaSupplier,
  MountRegistryOptions,
  RegistrySnapshot,
  RefreshResult,
} from './registry.js';
