#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * strata CLI - inspect and check a layered configuration project
 *
 * Commands:
 *   resolve [path]        Print the resolved tree (or a subtree)
 *   get <path>            Print the resolved value at a path
 *   origin <path>         Show which layers define a path
 *   check                 Validate and report diagnostics
 *   search <query>        Find names, values and references
 *   init                  Create a .strata.json settings file
 */

import { Command, type OptionValues } from 'commander';
import chalk from 'chalk';
import {
  initConfig,
  loadGlobalConfig,
  loadWorkspaceConfig,
  mergeConfig,
  reachesFailOn,
  validateConfig,
  type CLIOptions,
  type ResolvedConfig,
} from './config/index.js';
import { findNode } from './dom/tree.js';
import { searchTree } from './dom/search.js';
import { ContractError, PathNotFoundError, ProjectFileError, sortDiagnostics, type Diagnostic } from './errors.js';
import { serialize } from './io/parser.js';
import { logger, parseLogLevel } from './logger.js';
import type { RegistrySnapshot } from './mount/registry.js';
import { renderDiagnostics, renderOrigin, renderSearchResults } from './cli/output.js';
import { openWorkspace, type Workspace } from './cli/workspace.js';
import { VERSION } from './version.js';

// ============================================
// Utility Functions
// ============================================

function stringOption(values: OptionValues, key: string): string | undefined {
  const value: unknown = values[key];
  return typeof value === 'string' ? value : undefined;
}

function flagOption(values: OptionValues, key: string): boolean {
  return values[key] === true;
}

/**
 * Apply log flags and merge settings from global, workspace and CLI.
 */
function resolveSettings(command: Command): ResolvedConfig {
  const values = command.optsWithGlobals();
  logger.setLevel(parseLogLevel({
    verbose: flagOption(values, 'verbose'),
    debug: flagOption(values, 'debug'),
    trace: flagOption(values, 'trace'),
  }));

  const cliOptions: CLIOptions = {
    project: stringOption(values, 'project'),
    schema: stringOption(values, 'schema'),
    strict: flagOption(values, 'strict'),
    format: stringOption(values, 'format'),
    failOn: stringOption(values, 'failOn'),
    upTo: stringOption(values, 'upTo'),
  };

  const global = loadGlobalConfig();
  const workspace = loadWorkspaceConfig();
  for (const { config, configPath } of [global, workspace]) {
    if (!config) continue;
    for (const warning of validateConfig(config)) {
      logger.warn(`${configPath}: ${warning}`);
    }
  }
  if (workspace.configPath) logger.verbose(`Settings: ${workspace.configPath}`);
  return mergeConfig(workspace.config, cliOptions, global.config);
}

/**
 * Open the workspace and run one refresh.
 */
async function loadSnapshot(config: ResolvedConfig): Promise<{ workspace: Workspace; snapshot: RegistrySnapshot }> {
  const workspace = await openWorkspace(config);
  const { snapshot } = await workspace.registry.refresh();
  if (!snapshot) {
    throw new ContractError('Refresh produced no snapshot');
  }
  return { workspace, snapshot };
}

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const line of renderDiagnostics(diagnostics)) {
    console.error(line);
  }
}

/**
 * Run an action, turning expected failures into a message and exit code 1.
 */
function run(action: (command: Command) => Promise<void>): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const command = args[args.length - 1];
    if (!(command instanceof Command)) {
      throw new ContractError('Action invoked without its command');
    }
    try {
      await action(command);
    } catch (error) {
      if (error instanceof ProjectFileError || error instanceof PathNotFoundError || error instanceof ContractError) {
        logger.error(error.message, error);
        process.exit(1);
      }
      throw error;
    }
  };
}

// ============================================
// Commands
// ============================================

const program = new Command();

program
  .name('strata')
  .description('Layered configuration cascade: merge, resolve and validate')
  .version(VERSION)
  .option('-p, --project <file>', 'Cascade project file')
  .option('--schema <file>', 'Schema document (YAML or JSON)')
  .option('--strict', 'Report properties the schema does not declare')
  .option('-f, --format <format>', 'Output format (json, json5, yaml)')
  .option('--up-to <layer>', 'Only merge layers up to and including this one')
  .option('--fail-on <level>', 'Exit non-zero at this severity (error, warning, never)')
  .option('--verbose', 'Show layer loading and refresh summaries')
  .option('--debug', 'Show merge and resolution details')
  .option('--trace', 'Show per-file and per-reference events');

// Resolve command
program
  .command('resolve')
  .description('Print the resolved tree, or the subtree at a path')
  .argument('[path]', 'Path to print', '/')
  .action(run(async (command) => {
    const config = resolveSettings(command);
    const [target = '/'] = command.args;
    const { snapshot } = await loadSnapshot(config);
    const node = findNode(snapshot.root, target);
    if (!node) {
      throw new PathNotFoundError(target);
    }
    process.stdout.write(serialize(node, config.format, { refKey: config.refKey }));
    if (snapshot.diagnostics.length > 0) printDiagnostics(snapshot.diagnostics);
    if (reachesFailOn(snapshot.diagnostics, config)) process.exit(1);
  }));

// Get command
program
  .command('get')
  .description('Print the resolved value at a path')
  .argument('<path>', 'Path to read')
  .action(run(async (command) => {
    const config = resolveSettings(command);
    const [target] = command.args;
    const { snapshot } = await loadSnapshot(config);
    const node = findNode(snapshot.root, target);
    if (!node) {
      throw new PathNotFoundError(target);
    }
    if (node.kind === 'value') {
      console.log(node.value === null ? 'null' : String(node.value));
    } else {
      process.stdout.write(serialize(node, config.format, { refKey: config.refKey }));
    }
  }));

// Origin command
program
  .command('origin')
  .description('Show which layers define a path and which one wins')
  .argument('<path>', 'Path to trace')
  .action(run(async (command) => {
    const config = resolveSettings(command);
    const [target] = command.args;
    const { workspace } = await loadSnapshot(config);
    const report = workspace.originOf(target);
    if (!report) {
      console.log(chalk.gray(`No layer defines ${target}.`));
      process.exit(1);
    }
    for (const line of renderOrigin(report)) {
      console.log(line);
    }
  }));

// Check command
program
  .command('check')
  .description('Validate the project and report diagnostics')
  .action(run(async (command) => {
    const config = resolveSettings(command);
    const { workspace, snapshot } = await loadSnapshot(config);
    const diagnostics = sortDiagnostics([...snapshot.diagnostics, ...workspace.integrityDiagnostics()]);
    printDiagnostics(diagnostics);
    if (reachesFailOn(diagnostics, config)) {
      process.exit(1);
    }
    console.log(chalk.green(`✓ ${snapshot.mounts.length} mounts checked`));
  }));

// Search command
program
  .command('search')
  .description('Search names, values and reference paths (case-insensitive)')
  .argument('<query>', 'Text to look for')
  .option('--unresolved', 'Search the tree before references are resolved')
  .action(run(async (command) => {
    const config = resolveSettings(command);
    const [query] = command.args;
    const { snapshot } = await loadSnapshot(config);
    const root = flagOption(command.opts(), 'unresolved') ? snapshot.unresolved : snapshot.root;
    for (const line of renderSearchResults(searchTree(root, query))) {
      console.log(line);
    }
  }));

// Init command
program
  .command('init')
  .description('Create a .strata.json settings file in the current directory')
  .action(() => {
    const result = initConfig();
    if (!result.success) {
      console.error(chalk.red(`${result.error}: ${result.path}`));
      process.exit(1);
    }
    console.log(chalk.green(`Created ${result.path}`));
  });

// Parse and execute
await program.parseAsync();
