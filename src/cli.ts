#!/usr/bin/env node

import * as path from 'node:path';
import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import * as yaml from 'yaml';
import { LogLevel } from './types';
import { loadConfig } from './utils/config';
import logger, { addFileTransport, setLogLevel } from './utils/logger';
import { parseOverrides, validateProjectTree } from './utils/validators';
import { ProjectStack } from './stack/project-stack';
import { loadManifest } from './walker/manifest';
import { TreeWalker, type WalkEvent, WalkEventType } from './walker/tree-walker';

function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

// ─── Global error handlers ───────────────────────────────────────────────────

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  if (error.stack) logger.error(error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  logger.error(`Unhandled rejection: ${message}`);
  process.exit(1);
});

// ─── CLI Setup ───────────────────────────────────────────────────────────────

const program = new Command();

program
  .name('pstack')
  .description('Inspect how a nested build walks an umbrella project through the project stack')
  .version(readVersion());

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

interface WalkCommandOptions {
  set: string[];
  fromRoot: boolean;
  config: string;
  verbose: boolean;
}

// ─── pstack walk ─────────────────────────────────────────────────────────────

program
  .command('walk')
  .description('Walk an umbrella manifest, pushing and popping each project; projects nested under their own name are reported as conflicts')
  .argument('<manifest>', 'YAML or JSON manifest describing the project tree')
  .option('--set <key=value>', 'Config override for the top-level project (repeatable)', collect, [])
  .option('--from-root', 'Run each leaf from its recursing ancestor\'s directory', false)
  .option('--config <dir>', 'Directory holding pstack.config.yaml', process.cwd())
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (manifestPath: string, opts: WalkCommandOptions) => {
    const config = loadConfig(opts.config);
    setLogLevel(opts.verbose ? LogLevel.DEBUG : config.log.level);
    if (config.log.file) {
      addFileTransport(opts.config);
    }

    const manifest = loadManifest(path.resolve(manifestPath));
    for (const clash of validateProjectTree(manifest)) {
      logger.warn(clash.message);
    }
    const stack = new ProjectStack(config.stack);
    const walker = new TreeWalker(stack);

    console.log(chalk.bold.cyan(`\nWalking ${manifest.name ?? path.basename(manifest.file)}\n`));
    const events = await walker.walk(manifest, {
      overrides: parseOverrides(opts.set),
      fromRoot: opts.fromRoot,
    });

    for (const event of events) {
      const line = formatEvent(event, opts.verbose);
      if (line !== null) {
        console.log(line);
      }
    }

    const conflicts = events.filter((e) => e.type === WalkEventType.CONFLICT).length;
    if (conflicts > 0) {
      console.log(chalk.red(`\n${conflicts} project(s) could not be entered.\n`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green('\nDone.\n'));
    }
  });

// ─── pstack config ───────────────────────────────────────────────────────────

program
  .command('config')
  .description('Print the effective configuration')
  .option('--config <dir>', 'Directory holding pstack.config.yaml', process.cwd())
  .action((opts: { config: string }) => {
    console.log(yaml.stringify(loadConfig(opts.config)));
  });

function formatEvent(event: WalkEvent, verbose: boolean): string | null {
  const indent = '  '.repeat(event.depth);
  const name = event.project ?? '(anonymous)';

  switch (event.type) {
    case WalkEventType.BANNER:
      return `${indent}${chalk.bold(`==> ${event.detail}`)}`;
    case WalkEventType.CONFLICT:
      return `${indent}${chalk.red('✗')} ${name} ${chalk.gray(event.detail)}`;
    case WalkEventType.ROOTED:
      return `${indent}${chalk.yellow('↑')} ${name} rooted at ${event.detail}`;
    case WalkEventType.ENTER:
      return verbose
        ? `${indent}${chalk.cyan('→')} ${name} ${chalk.gray(`(${event.detail}, config mtime ${event.mtime ?? 0})`)}`
        : null;
    case WalkEventType.LEAVE:
      return verbose ? `${indent}${chalk.gray('←')} ${name}` : null;
  }
}

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(message);
  process.exitCode = 1;
});
