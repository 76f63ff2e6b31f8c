import chalk from 'chalk'
import type {Command} from 'commander'
import {LsblkInventory} from '../../disks/inventory.js'
import {resolveTopology, type SelectionMode} from '../../disks/topology.js'
import {formatSize} from '../../utils.js'
import {getGlobalOptions} from '../utils.js'

const automaticModes: SelectionMode[] = [{kind: 'auto-all'}, {kind: 'auto-smallest-pair-for-system'}]

export function registerDisksCommand(program: Command): void {
  program
    .command('disks')
    .description('List the disks and the layout each selection mode would use')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const disks = await new LsblkInventory().list()
      const decisions = automaticModes.map(mode => resolveTopology(disks, mode))

      if (json) {
        console.log(JSON.stringify({disks, decisions}, null, 2))
        return
      }

      const pathWidth = Math.max('DISK'.length, ...disks.map(disk => disk.path.length))
      console.log(chalk.bold(`  #  ${'DISK'.padEnd(pathWidth)}  ${'SIZE'.padStart(9)}  MODEL`))
      for (const [index, disk] of disks.entries()) {
        console.log(`${String(index + 1).padStart(3)}  ${disk.path.padEnd(pathWidth)}  ${formatSize(disk.sizeBytes).padStart(9)}  ${disk.model ?? ''}`)
      }

      console.log()
      for (const decision of decisions) {
        const assigned = decision.assigned.map(disk => disk.path).join(', ')
        const excluded = decision.excluded.length > 0 ? chalk.gray(` (untouched: ${decision.excluded.map(disk => disk.path).join(', ')})`) : ''
        console.log(`${chalk.cyan(decision.mode)}: ${decision.redundancy} on ${assigned}${excluded}`)
      }
    })
}
