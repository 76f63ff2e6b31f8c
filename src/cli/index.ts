#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {ProvisionError} from '../errors.js'
import {registerAnswerCommand} from './commands/answer.js'
import {registerDisksCommand} from './commands/disks.js'
import {registerRunCommand} from './commands/run.js'

async function main() {
  const program = new Command()

  program
    .name('provisio')
    .description('Unattended Proxmox VE installation from a rescue system')
    .version('0.1.0')
    .option('--workdir <path>', 'Working directory for images, answer file and logs', process.env.PROVISIO_WORKDIR ?? './workdir')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerDisksCommand(program)
  registerAnswerCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof ProvisionError) {
    console.error(chalk.red(`${error.message} [${error.code}]`))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
