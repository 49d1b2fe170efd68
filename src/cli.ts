#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), (error as Error).message);
    process.exit(1);
  });
