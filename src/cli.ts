#!/usr/bin/env node
import logger from './utils/logger.js';
import { initializeDebugManager } from './utils/debug-manager.js';
import { formatConfigInfo, loadConfiguration } from './utils/config-loader.js';
import { getErrorMessage } from './errors/wam-errors.js';
import { WamController } from './controller.js';
import { runCommand } from './cli-commands.js';

const result = loadConfiguration();
initializeDebugManager(result.config);
logger.debug(formatConfigInfo(result));

const controller = WamController.fromConfig(result.config);

runCommand(controller, process.argv.slice(2), line => process.stdout.write(`${line}\n`))
  .catch((error: unknown) => {
    logger.error(getErrorMessage(error));
    process.exitCode = 1;
  });
