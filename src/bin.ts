#!/usr/bin/env node

// src/bin.ts - Demo application: the example commands behind the dispatcher

// Check Node.js version before doing anything else
const nodeVersion = process.version;
const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0], 10);
if (majorVersion < 20) {
  console.error(`❌ Node.js 20+ required. Current: ${nodeVersion}`);
  process.exit(1);
}

import { CommandsRegistry } from './core/commands-registry.js';
import { dispatch } from './cli/dispatcher.js';
import { registerExampleCommands } from './cli/commands/register-commands.js';
import { RuntimeConfigLoader } from './config/runtime-config-loader.js';
import { describeThrown } from './utils/errors.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<number> {
  const config = await new RuntimeConfigLoader(process.cwd()).load();
  Logger.setLevel(config.logLevel);

  const registry = new CommandsRegistry();
  registerExampleCommands(registry, config.lockDir);

  // process.argv.slice(2) drops the node binary and the script path
  return dispatch(process.argv.slice(2), registry, {
    output: process.stdout,
    exit: (code) => {
      process.exitCode = code;
    },
    color: process.stdout.isTTY === true,
  });
}

main().catch((err) => {
  Logger.error(`Fatal error: ${describeThrown(err)}`);
  process.exitCode = 1;
});
