#!/usr/bin/env tsx
/**
 * vertexmap CLI entry point
 */

import { CommanderError } from 'commander'
import { createLogger } from '@vertexmap/core'
import { createProgram } from './program'

const logger = createLogger('vertexmap')

async function main(): Promise<void> {
  try {
    await createProgram({ logger, print: (line) => console.log(line) }).parseAsync(process.argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode
      return
    }
    logger.error(error instanceof Error ? error.message : String(error))
    process.exitCode = 1
  }
}

void main()
