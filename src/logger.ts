// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for debug output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';
import { countBySeverity, type Diagnostic } from './errors.js';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - layer loading and refresh summaries */
  VERBOSE = 1,
  /** Debug - merge and resolution details */
  DEBUG = 2,
  /** Trace - per-unit and per-reference events */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a built layer at VERBOSE level.
   */
  layerLoaded(name: string, index: number, unitCount: number, failed: boolean): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      if (failed) {
        console.log(chalk.red(`✗ layer ${index} "${name}"`) + chalk.dim(` (${unitCount} units, failed)`));
      } else {
        console.log(chalk.green(`✓ layer ${index} "${name}"`) + chalk.dim(` (${unitCount} units)`));
      }
    }
  }

  /**
   * Log an inter-layer merge at DEBUG level.
   */
  mergeSummary(layerCount: number, pathCount: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Merge] ${layerCount} layers, ${pathCount} tracked paths`));
    }
  }

  /**
   * Log a reference resolution pass at DEBUG level.
   */
  resolveSummary(resolved: number, failed: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const failedStr = failed > 0 ? chalk.yellow(`, ${failed} failed`) : '';
      console.log(chalk.dim(`[Resolve] ${resolved} references resolved`) + failedStr);
    }
  }

  /**
   * Log a completed registry refresh at VERBOSE level.
   */
  refreshSummary(generation: number, mountCount: number, diagnostics: readonly Diagnostic[], duration: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const counts = countBySeverity(diagnostics);
      console.log(chalk.dim(
        `[Refresh #${generation}] ${mountCount} mounts, ` +
        `${counts.error} errors, ${counts.warning} warnings, ${duration.toFixed(2)}s`
      ));
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    console.log(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
