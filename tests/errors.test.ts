// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  countBySeverity,
  DecodeMismatchError,
  diagnostic,
  formatDiagnostic,
  PathNotFoundError,
  ProjectFileError,
  Severity,
  sortDiagnostics,
} from '../src/errors.js';

describe('diagnostics', () => {
  it('defaults to error severity and omits an absent source', () => {
    expect(diagnostic('LoadError', '/a', 'bad')).toEqual({
      path: '/a',
      kind: 'LoadError',
      message: 'bad',
      severity: Severity.ERROR,
    });
    expect('source' in diagnostic('LoadError', '/a', 'bad')).toBe(false);
  });

  it('sorts by path, then kind, then message', () => {
    const sorted = sortDiagnostics([
      diagnostic('TypeMismatch', '/b', 'x'),
      diagnostic('RangeViolation', '/a', 'z'),
      diagnostic('RangeViolation', '/a', 'y'),
      diagnostic('EnumViolation', '/a', 'w'),
    ]);
    expect(sorted.map((d) => `${d.path} ${d.kind} ${d.message}`)).toEqual([
      '/a EnumViolation w',
      '/a RangeViolation y',
      '/a RangeViolation z',
      '/b TypeMismatch x',
    ]);
  });

  it('counts each severity', () => {
    expect(countBySeverity([
      diagnostic('LoadError', '/', 'a'),
      diagnostic('IntegrityWarning', '/', 'b', Severity.WARNING),
      diagnostic('IntegrityWarning', '/', 'c', Severity.WARNING),
    ])).toEqual({ error: 1, warning: 2, info: 0 });
  });

  it('formats one line per diagnostic', () => {
    expect(formatDiagnostic(diagnostic('OverlapError', '/a/x', 'Defined twice', Severity.ERROR, 'base'))).toBe(
      'error: [OverlapError] /a/x: Defined twice (base)'
    );
  });
});

describe('error classes', () => {
  it('PathNotFoundError names the path', () => {
    const error = new PathNotFoundError('/db/port');
    expect(error.message).toBe("Configuration path '/db/port' not found");
    expect(error.name).toBe('PathNotFoundError');
    expect(error.path).toBe('/db/port');
  });

  it('DecodeMismatchError lists the zod issues', () => {
    const result = z.object({ port: z.number() }).safeParse({ port: 'x' });
    if (result.success) throw new Error('expected a failure');
    const error = new DecodeMismatchError('/db', result.error.issues);
    expect(error.message).toBe(
      "Value at '/db' does not match the requested shape: port: Expected number, received string"
    );
  });

  it('ProjectFileError keeps the file path', () => {
    const error = new ProjectFileError('Invalid project file x', '/work/x');
    expect(error.filePath).toBe('/work/x');
    expect(error).toBeInstanceOf(Error);
  });
});
