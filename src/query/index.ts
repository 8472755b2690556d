// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export { DomQuery } from './dom-query.js';
