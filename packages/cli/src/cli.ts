#!/usr/bin/env node
/**
 * @linger2ibex/cli - CLI for converting linger stimulus banks to ibex
 */

import { Command } from 'commander';
import { convertCommand } from './commands/convert.js';
import { readPackageVersion } from './utils/packageVersion.js';

const program = new Command();

program
  .name('linger2ibex')
  .description('Convert linger-format stimuli into ibex experiment items')
  .version(readPackageVersion());

program.addCommand(convertCommand);

program.parse();
