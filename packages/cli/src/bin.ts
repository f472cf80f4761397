#!/usr/bin/env node

import chalk from 'chalk'
import { buildProgram } from './index'

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red('❌ An error occurred:'), error)
    process.exit(1)
  })
