import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadConfig} from '../../config.js'
import {LsblkInventory} from '../../disks/inventory.js'
import {ImagePreparer} from '../../engine/image.js'
import {QemuExecutor} from '../../engine/qemu-executor.js'
import {execaToolRunner, toolLog} from '../../engine/tool.js'
import {Workspace} from '../../engine/workspace.js'
import {ProvisionError} from '../../errors.js'
import {addressOf, detectNetwork} from '../../network.js'
import {PipelineRunner} from '../../pipeline-runner.js'
import {RemoteConfigurator} from '../../remote/configurator.js'
import {ConsoleReporter} from '../../reporter.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {getGlobalOptions, selectionFromFlags} from '../utils.js'

type RunOptions = {
  password?: string;
  disks?: string;
  systemPair?: boolean;
  skipPackages?: boolean;
  dryRun?: boolean;
  reboot?: boolean;
  verbose?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Install Proxmox VE on this machine\'s disks and configure it')
    .argument('[config]', 'Config file (default: provisio.yml when present)')
    .option('-p, --password <password>', 'Root password of the installed system (or PROVISIO_ROOT_PASSWORD)')
    .option('--disks <indexes>', 'Use only these disks, as 1-based inventory indexes (e.g. 1,2)')
    .option('--system-pair', 'Install on the two smallest disks as a mirror, leave the others untouched')
    .option('--skip-packages', 'Do not install host packages (already present)')
    .option('--dry-run', 'Write the answer file and configuration files, then stop')
    .option('--reboot', 'Reboot the host once provisioning is done')
    .option('--verbose', 'Stream virtual machine output in real-time (interactive mode)')
    .action(async (configFile: string | undefined, options: RunOptions, cmd: Command) => {
      const {workdir, json} = getGlobalOptions(cmd)
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const executor = new QemuExecutor()

      const onSignal = (signal: NodeJS.Signals) => {
        void (async () => {
          await executor.killRunningMachines()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      let started = false
      try {
        const config = await loadConfig(configFile, {
          rootPassword: options.password,
          disks: selectionFromFlags(options),
          skipPackages: options.skipPackages
        })
        const workspace = await Workspace.open(resolve(workdir))
        const configurator = new RemoteConfigurator({nameservers: config.nameservers})
        const runner = new PipelineRunner({
          inventory: new LsblkInventory(),
          executor,
          images: new ImagePreparer(),
          configurator,
          async detectNetwork(interfaceName) {
            return detectNetwork(interfaceName)
          }
        }, reporter)

        started = true
        const {state, context} = await runner.run(config, workspace, {dryRun: options.dryRun})
        if (state !== 'Done') {
          console.log(`Answer file: ${workspace.path('answer.toml')}`)
          return
        }

        if (context.network) {
          console.log(chalk.bold(`Web interface: https://${addressOf(context.network.ipv4Cidr)}:8006`))
        }

        if (options.reboot) {
          const result = await execaToolRunner('reboot', [])
          if (result.failed) {
            console.error(chalk.red(`reboot failed: ${toolLog(result)}`))
            process.exitCode = 1
          }
        }
      } catch (error: unknown) {
        if (!(error instanceof ProvisionError)) {
          throw error
        }

        // phase failures are already reported
        if (!started) {
          console.error(chalk.red(`${error.message} [${error.code}]`))
        }

        process.exitCode = 1
      } finally {
        process.removeListener('SIGINT', onSignal)
        process.removeListener('SIGTERM', onSignal)
      }
    })
}
