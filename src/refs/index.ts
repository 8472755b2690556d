// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export { ReferenceResolver, resolveReferences } from './resolver.js';
export type { Resolution, ResolutionFailure, ResolveResult } from './resolver.js';
