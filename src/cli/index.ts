#!/usr/bin/env node
/**
 * @entry hindsight CLI
 *
 *   hindsight memory list|show|search|stats|feedback
 *   hindsight maintenance run <daily|weekly|monthly>
 *   hindsight maintenance start
 */

import { Command } from 'commander'
import { registerMemoryCommands } from './commands/memory.js'
import { registerMaintenanceCommands } from './commands/maintenance.js'
import { setLogLevel } from '../shared/logger.js'
import { printError } from './errors.js'

const program = new Command()

program
  .name('hindsight')
  .description('Learning memory for task agents')
  .version('0.1.0')
  .option('-v, --verbose', 'Debug logging')
  .hook('preAction', command => {
    if (command.opts().verbose) setLogLevel('debug')
  })

registerMemoryCommands(program)
registerMaintenanceCommands(program)

program.parseAsync().catch((error: unknown) => {
  printError(error)
  process.exitCode = 1
})
