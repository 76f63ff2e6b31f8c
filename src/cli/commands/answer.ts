import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {buildInstallArtifact, renderAnswerFile, writeAnswerFile} from '../../artifact/answer-file.js'
import {loadConfig} from '../../config.js'
import {LsblkInventory} from '../../disks/inventory.js'
import {resolveTopology} from '../../disks/topology.js'
import {Workspace} from '../../engine/workspace.js'
import {getGlobalOptions, selectionFromFlags} from '../utils.js'

export function registerAnswerCommand(program: Command): void {
  program
    .command('answer')
    .description('Write the answer file to the workdir and print it')
    .argument('[config]', 'Config file (default: provisio.yml when present)')
    .option('-p, --password <password>', 'Root password of the installed system (or PROVISIO_ROOT_PASSWORD)')
    .option('--disks <indexes>', 'Use only these disks, as 1-based inventory indexes (e.g. 1,2)')
    .option('--system-pair', 'Install on the two smallest disks as a mirror')
    .action(async (configFile: string | undefined, options: {password?: string; disks?: string; systemPair?: boolean}, cmd: Command) => {
      const {workdir} = getGlobalOptions(cmd)
      const config = await loadConfig(configFile, {
        rootPassword: options.password,
        disks: selectionFromFlags(options)
      })

      const disks = await new LsblkInventory().list()
      const artifact = buildInstallArtifact(config.identity, {source: 'from-dhcp'}, resolveTopology(disks, config.disks))
      const workspace = await Workspace.open(resolve(workdir))
      await writeAnswerFile(workspace, artifact)
      process.stdout.write(renderAnswerFile(artifact))
    })
}
