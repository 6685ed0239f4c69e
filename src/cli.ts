#!/usr/bin/env node

import chalk from "chalk"
import { isConversionError } from "./errors.js"
import { createProgram } from "./program.js"

try {
  await createProgram().parseAsync()
} catch (error) {
  if (isConversionError(error)) {
    console.error(chalk.red(`\n❌ ${error.message}\n`))
  } else {
    console.error(chalk.red("❌ Conversion failed:"), error)
  }
  process.exit(1)
}
