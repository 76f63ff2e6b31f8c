import {buildInstallArtifact, writeAnswerFile, type InstallArtifact} from './artifact/answer-file.js'
import {loadTemplateSources, renderTemplateSet, templateValues} from './artifact/templates.js'
import type {ProvisionConfig} from './config.js'
import type {DiskDescriptor, DiskInventory} from './disks/inventory.js'
import {resolveTopology, type TopologyDecision} from './disks/topology.js'
import type {VirtualMachineExecutor} from './engine/executor.js'
import type {ImagePreparer} from './engine/image.js'
import {waitForService, type WaitForServiceOptions} from './engine/readiness.js'
import type {HostCapabilities, ServiceEndpoint, VirtualMachineRequest, VirtualSession} from './engine/types.js'
import type {Workspace} from './engine/workspace.js'
import {InstallationFailedError, PhasePreconditionError, ServiceUnreachableError, VirtualMachineStartError} from './errors.js'
import type {DetectedNetwork, NetworkSettings} from './network.js'
import type {ApplyResult, PushedFile, RemoteConfigurator} from './remote/configurator.js'

/**
 * States of a provisioning run, in the only order they can be reached.
 */
export const pipelineStates = [
  'Idle',
  'InventoryResolved',
  'ArtifactBuilt',
  'ImagePrepared',
  'InstallRunning',
  'InstallComplete',
  'ConfigureSessionUp',
  'NetworkReady',
  'RemoteConfigured',
  'TargetPoweredOff',
  'Done'
] as const

export type PipelineState = (typeof pipelineStates)[number]

/**
 * Everything the phases produce and consume, passed explicitly from one phase to the next.
 */
export type ProvisionContext = {
  readonly config: ProvisionConfig;
  readonly workspace: Workspace;
  inventory?: DiskDescriptor[];
  decision?: TopologyDecision;
  network?: NetworkSettings;
  artifact?: InstallArtifact;
  /** Rendered configuration files, ready to push */
  files?: PushedFile[];
  capabilities?: HostCapabilities;
  imagePath?: string;
  session?: VirtualSession;
  endpoint?: ServiceEndpoint;
  applied?: ApplyResult;
}

/**
 * Collaborators of the phases. Tests replace each of them with an in-process fake.
 */
export type PhaseServices = {
  inventory: DiskInventory;
  executor: VirtualMachineExecutor;
  images: Pick<ImagePreparer, 'preparePackages' | 'downloadImage' | 'prepareAutoinstallImage'>;
  configurator: Pick<RemoteConfigurator, 'apply'>;
  detectNetwork: (interfaceName?: string) => Promise<DetectedNetwork>;
  templatesDir?: string;
  /** Passed to the readiness poll (probe and sleep overrides) */
  readiness?: Pick<WaitForServiceOptions, 'probe' | 'sleep'>;
}

export type PhaseScope = {
  context: ProvisionContext;
  services: PhaseServices;
  log(stream: 'stdout' | 'stderr', line: string): void;
  warn(message: string): void;
}

export type PipelinePhase = {
  id: string;
  displayName: string;
  /** State held while the phase runs, when it differs from the previous one */
  entering?: PipelineState;
  /** State reached when the phase succeeds */
  target: PipelineState;
  /** Retryable phases retry within a bound of their own; no phase is run twice */
  failure: 'fatal' | 'retryable';
  run(scope: PhaseScope): Promise<void>;
}

const guestSshPort = 22

/**
 * Returns a context field an earlier phase must have produced.
 * @throws PhasePreconditionError
 */
export function requireField<K extends keyof ProvisionContext>(
  context: ProvisionContext,
  field: K,
  phase: string
): NonNullable<ProvisionContext[K]> {
  const value = context[field]
  if (value === undefined || value === null) {
    throw new PhasePreconditionError(phase, field)
  }

  return value
}

function vmRequest(
  context: ProvisionContext,
  phase: string,
  fields: Pick<VirtualMachineRequest, 'name' | 'cdrom' | 'networking' | 'noReboot' | 'logPath'>
): VirtualMachineRequest {
  const {config} = context
  return {
    ...fields,
    disks: requireField(context, 'decision', phase).assigned.map(disk => disk.path),
    capabilities: requireField(context, 'capabilities', phase),
    cpus: config.vm.cpus,
    memoryMb: config.vm.memoryMb
  }
}

async function resolveNetwork(config: ProvisionConfig, detect: PhaseServices['detectNetwork']): Promise<NetworkSettings> {
  const {interfaceName, ipv4Cidr, ipv4Gateway, macAddress, ipv6Cidr, privateSubnet} = config.network
  if (interfaceName !== undefined && ipv4Cidr !== undefined && ipv4Gateway !== undefined && macAddress !== undefined && ipv6Cidr !== undefined) {
    return {interfaceName, ipv4Cidr, ipv4Gateway, macAddress, ipv6Cidr, privateSubnet}
  }

  const detected = await detect(interfaceName)
  return {
    interfaceName: detected.interfaceName,
    ipv4Cidr: ipv4Cidr ?? detected.ipv4Cidr,
    ipv4Gateway: ipv4Gateway ?? detected.ipv4Gateway,
    macAddress: macAddress ?? detected.macAddress,
    ipv6Cidr: ipv6Cidr ?? detected.ipv6Cidr,
    privateSubnet
  }
}

export const resolveDisksPhase: PipelinePhase = {
  id: 'resolve-disks',
  displayName: 'Resolve disk topology',
  target: 'InventoryResolved',
  failure: 'fatal',
  async run({context, services, log}) {
    const inventory = await services.inventory.list()
    const decision = resolveTopology(inventory, context.config.disks)
    context.inventory = inventory
    context.decision = decision
    log('stdout', `${decision.redundancy}: ${decision.assigned.map(disk => disk.path).join(', ')}`)
    if (decision.excluded.length > 0) {
      log('stdout', `untouched: ${decision.excluded.map(disk => disk.path).join(', ')}`)
    }
  }
}

export const buildArtifactPhase: PipelinePhase = {
  id: 'build-artifact',
  displayName: 'Build answer file and configuration',
  target: 'ArtifactBuilt',
  failure: 'fatal',
  async run({context, services}) {
    const decision = requireField(context, 'decision', 'build-artifact')
    const {config, workspace} = context

    const artifact = buildInstallArtifact(config.identity, {source: 'from-dhcp'}, decision)
    await workspace.remove('answer.toml')
    await writeAnswerFile(workspace, artifact)

    // templates are rendered before any virtual machine runs
    const network = await resolveNetwork(config, services.detectNetwork)
    const sources = await loadTemplateSources(services.templatesDir)
    const rendered = renderTemplateSet(sources, templateValues(config.identity, network))

    const files: PushedFile[] = []
    for (const template of rendered) {
      const localPath = await workspace.writeTemplate(template.name, template.content)
      files.push({name: template.name, localPath, destination: template.destination})
    }

    context.artifact = artifact
    context.network = network
    context.files = files
  }
}

export const prepareImagePhase: PipelinePhase = {
  id: 'prepare-image',
  displayName: 'Prepare installer image',
  target: 'ImagePrepared',
  failure: 'fatal',
  async run({context, services, log, warn}) {
    requireField(context, 'artifact', 'prepare-image')
    const {config, workspace} = context

    if (config.image.skipPackages) {
      log('stdout', 'host packages skipped')
    } else {
      await services.images.preparePackages()
    }

    await services.executor.check()
    const capabilities = await services.executor.inspectHost()
    if (!capabilities.acceleration) {
      warn('Hardware acceleration unavailable, falling back to emulation (slow)')
    }

    log('stdout', `firmware: ${capabilities.uefi ? 'UEFI' : 'legacy BIOS'}`)
    context.capabilities = capabilities

    await services.images.downloadImage(config.image.url, workspace, {reuse: config.image.reuseDownload})
    context.imagePath = await services.images.prepareAutoinstallImage(workspace)
  }
}

export const installPhase: PipelinePhase = {
  id: 'install',
  displayName: 'Run unattended install',
  entering: 'InstallRunning',
  target: 'InstallComplete',
  failure: 'fatal',
  async run({context, services, log}) {
    const request = vmRequest(context, 'install', {
      name: 'provisio-install',
      cdrom: requireField(context, 'imagePath', 'install'),
      networking: {mode: 'none'},
      noReboot: true,
      logPath: context.workspace.path('qemu-install.log')
    })

    const result = await services.executor.run(request, ({stream, line}) => {
      log(stream, line)
    })

    if (result.error) {
      throw new VirtualMachineStartError(`Failed to start ${request.name}: ${result.error}`)
    }

    if (result.exitCode !== 0) {
      throw new InstallationFailedError(result.exitCode ?? -1, result.log)
    }
  }
}

export const bootPhase: PipelinePhase = {
  id: 'boot',
  displayName: 'Boot installed system',
  target: 'ConfigureSessionUp',
  failure: 'fatal',
  async run({context, services, log}) {
    const {config} = context
    const request = vmRequest(context, 'boot', {
      name: 'provisio-configure',
      networking: {mode: 'forwarded-port', hostPort: config.vm.sshPort, guestPort: guestSshPort},
      logPath: context.workspace.path('qemu-configure.log')
    })

    const session = await services.executor.start(request)
    context.session = session
    context.endpoint = {host: 'localhost', port: config.vm.sshPort}
    log('stdout', `pid ${session.pid}, ssh forwarded on port ${config.vm.sshPort}`)
  }
}

export const waitSshPhase: PipelinePhase = {
  id: 'wait-ssh',
  displayName: 'Wait for SSH',
  target: 'NetworkReady',
  failure: 'retryable',
  async run({context, services, log}) {
    const session = requireField(context, 'session', 'wait-ssh')
    const endpoint = requireField(context, 'endpoint', 'wait-ssh')
    const {readiness} = context.config

    let attempt: number
    try {
      attempt = await waitForService(endpoint, {
        ...services.readiness,
        attempts: readiness.attempts,
        intervalMs: readiness.intervalMs,
        onAttempt(current, total) {
          log('stdout', `waiting for port ${endpoint.port} (${current}/${total})`)
        }
      })
    } catch (error) {
      if (error instanceof ServiceUnreachableError) {
        throw new ServiceUnreachableError(error.port, error.attempts, error.intervalMs, session.log, {cause: error})
      }

      throw error
    }

    log('stdout', `port ${endpoint.port} open after ${attempt} attempt${attempt > 1 ? 's' : ''}`)
  }
}

export const configurePhase: PipelinePhase = {
  id: 'configure',
  displayName: 'Configure installed system',
  target: 'RemoteConfigured',
  failure: 'fatal',
  async run({context, services, log, warn}) {
    const endpoint = requireField(context, 'endpoint', 'configure')
    const files = requireField(context, 'files', 'configure')
    const artifact = requireField(context, 'artifact', 'configure')

    const applied = await services.configurator.apply(
      endpoint,
      {username: 'root', password: artifact.global.rootPassword},
      files,
      {hostname: context.config.identity.hostname}
    )

    for (const destination of applied.uploaded) {
      log('stdout', `pushed ${destination}`)
    }

    for (const outcome of applied.commands) {
      if (outcome.ok) {
        log('stdout', `${outcome.step}: ok`)
      } else {
        warn(`${outcome.step} failed (${outcome.error ?? `exit ${String(outcome.code)}`}): ${outcome.command}`)
      }
    }

    context.applied = applied
  }
}

export const powerOffPhase: PipelinePhase = {
  id: 'power-off',
  displayName: 'Wait for power off',
  target: 'TargetPoweredOff',
  failure: 'fatal',
  async run({context, log}) {
    const session = requireField(context, 'session', 'power-off')
    // No bound: the guest was asked to power off, an operator interrupts a hung shutdown
    const exitCode = await session.waitForExit()
    log('stdout', `virtual machine exited (code ${String(exitCode)})`)
    await session.dispose()
  }
}

/**
 * The provisioning phases, in execution order.
 */
export const phases: readonly PipelinePhase[] = [
  resolveDisksPhase,
  buildArtifactPhase,
  prepareImagePhase,
  installPhase,
  bootPhase,
  waitSshPhase,
  configurePhase,
  powerOffPhase
]
