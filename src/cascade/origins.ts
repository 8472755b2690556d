// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Origin Map
 *
 * Records, per DOM path, every layer index that defined it and which layer
 * ultimately wins.
 */

export interface PathOrigin {
  /** Highest-precedence layer index defining the path */
  winner: number;
  /** Every defining layer index, ascending */
  contributors: readonly number[];
}

/**
 * Read-only view over per-path origin data.
 */
export class OriginMap {
  private readonly origins: ReadonlyMap<string, PathOrigin>;

  constructor(contributors: ReadonlyMap<string, readonly number[]>) {
    const origins = new Map<string, PathOrigin>();
    const paths = [...contributors.keys()].sort();
    for (const path of paths) {
      const layers = contributors.get(path) ?? [];
      if (layers.length === 0) continue;
      origins.set(path, { winner: Math.max(...layers), contributors: [...layers] });
    }
    this.origins = origins;
  }

  get size(): number {
    return this.origins.size;
  }

  get(path: string): PathOrigin | undefined {
    return this.origins.get(path);
  }

  /**
   * Winning layer index for a path.
   */
  winner(path: string): number | undefined {
    return this.origins.get(path)?.winner;
  }

  /**
   * All layer indices that defined a path.
   */
  contributors(path: string): readonly number[] {
    return this.origins.get(path)?.contributors ?? [];
  }

  /**
   * Paths in sorted order.
   */
  paths(): string[] {
    return [...this.origins.keys()];
  }

  /**
   * Plain-object form, keyed by path in sorted order.
   */
  toJSON(): Record<string, PathOrigin> {
    const out: Record<string, PathOrigin> = {};
    for (const [path, origin] of this.origins) {
      out[path] = { winner: origin.winner, contributors: [...origin.contributors] };
    }
    return out;
  }
}
