#!/usr/bin/env node
import { resolve } from 'node:path';
import process from 'node:process';
import meow from 'meow';
import chalk from 'chalk';
import { config as dotenvConfig } from 'dotenv';
import {
  createLogger,
  formatError,
  isFormTreeError,
  resolveFormTreeConfig,
  type FormTreeConfig,
} from '@formtree/core';
import { runFieldFind, type FieldFindResult } from './commands/fields-find.js';
import { runFieldsList, type FieldsListResult } from './commands/fields-list.js';
import { describeFlags } from './lib/field-summary.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const cli = meow(
  `\nUsage\n  $ formtree <command> [options]\n\nCommands\n  fields <document.yaml>                List every field of a form document\n  find <document.yaml> <qualified.name> Show one field and its kids\n\nOptions\n  --log-level   debug | info | warn | error (overrides FORMTREE_LOG_LEVEL)\n\nExamples\n  $ formtree fields ./forms/person.yaml\n  $ formtree find ./forms/person.yaml person.address.city\n`,
  {
    importMeta: import.meta,
    flags: {
      logLevel: { type: 'string' },
    },
  },
);

async function main(): Promise<void> {
  const [command, ...rest] = cli.input;
  const output = globalThis.console;

  let config: FormTreeConfig;
  try {
    config = resolveFormTreeConfig(
      cli.flags.logLevel ? { ...process.env, FORMTREE_LOG_LEVEL: cli.flags.logLevel } : process.env,
    );
  } catch (error) {
    reportError(error);
    return;
  }
  const logger = createLogger({ level: config.logLevel, prefix: '[formtree]' });

  switch (command) {
    case 'fields': {
      const [documentPath] = rest;
      if (!documentPath || rest.length > 1) {
        output.error('Error: fields takes exactly one document path.');
        process.exitCode = 1;
        return;
      }
      const result = await runFieldsList({ documentPath, parentCycle: config.parentCycle, logger });
      printFieldsList(result);
      return;
    }
    case 'find': {
      const [documentPath, qualifiedName] = rest;
      if (!documentPath || !qualifiedName || rest.length > 2) {
        output.error('Error: find takes a document path and a qualified field name.');
        process.exitCode = 1;
        return;
      }
      const result = await runFieldFind({
        documentPath,
        qualifiedName,
        parentCycle: config.parentCycle,
        logger,
      });
      printFieldFind(result);
      if (!result.found) {
        process.exitCode = 1;
      }
      return;
    }
    default: {
      cli.showHelp();
    }
  }
}

function printFieldsList(result: FieldsListResult): void {
  const output = globalThis.console;
  output.info(chalk.dim(result.path));
  if (result.fields.length === 0) {
    output.info(chalk.yellow('No fields.'));
    return;
  }
  for (const field of result.fields) {
    const indent = '  '.repeat(field.depth);
    const name = field.partialName ?? '(unnamed)';
    output.info(
      `${indent}${chalk.bold(name)} ${chalk.cyan(field.fieldType ?? 'unknown')} ${chalk.dim(
        `flags: ${describeFlags(field.flags)} • widgets: ${field.widgetCount}`,
      )}`,
    );
  }
}

function printFieldFind(result: FieldFindResult): void {
  const output = globalThis.console;
  if (!result.found || !result.field) {
    output.error(chalk.red(`No field named ${result.qualifiedName} in ${result.path}`));
    return;
  }
  const { field } = result;
  output.info(chalk.bold(field.qualifiedName));
  output.info(`  Type:    ${field.fieldType ?? 'unknown'}`);
  output.info(`  Flags:   ${describeFlags(field.flags)}`);
  output.info(`  Widgets: ${field.widgetCount}`);
  if (result.kids && result.kids.length > 0) {
    output.info('  Kids:');
    for (const kid of result.kids) {
      output.info(`    - ${kid}`);
    }
  }
}

function reportError(error: unknown): void {
  const message = isFormTreeError(error)
    ? formatError(error)
    : error instanceof Error
      ? error.message
      : String(error);
  globalThis.console.error(chalk.red(message));
  process.exitCode = 1;
}

main().catch(reportError);
