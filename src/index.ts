/**
 * Library exports for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {LsblkInventory, resolveTopology, buildInstallArtifact, renderAnswerFile} from 'provisio'
 *
 * const disks = await new LsblkInventory().list()
 * const decision = resolveTopology(disks, {kind: 'auto-smallest-pair-for-system'})
 * const artifact = buildInstallArtifact(identity, {source: 'from-dhcp'}, decision)
 * console.log(renderAnswerFile(artifact))
 * ```
 */
export * from './engine/index.js'
export * from './errors.js'
export {LsblkInventory, parseLsblk, type DiskDescriptor, type DiskInventory} from './disks/inventory.js'
export {redundancyFor, resolveTopology, type RedundancyClass, type SelectionMode, type TopologyDecision} from './disks/topology.js'
export {
  buildInstallArtifact,
  renderAnswerFile,
  writeAnswerFile,
  type Identity,
  type InstallArtifact,
  type InstallNetwork
} from './artifact/answer-file.js'
export {
  loadTemplateSources,
  renderTemplate,
  renderTemplateSet,
  templateSchemas,
  templateValues,
  type RenderedTemplate,
  type TemplateName,
  type TemplateValues
} from './artifact/templates.js'
export {detectNetwork, firstIpv6Cidr, privateIpCidr, type NetworkSettings} from './network.js'
export {RemoteConfigurator, type ApplyResult, type CommandOutcome, type PushedFile} from './remote/configurator.js'
export {SshShell, type RemoteShell, type ShellFactory} from './remote/ssh-shell.js'
export {loadConfig, parseConfig, type ProvisionConfig} from './config.js'
export {phases, pipelineStates, type PipelinePhase, type PipelineState, type ProvisionContext} from './phases.js'
export {PipelineRunner, type PipelineOutcome, type PipelineRunOptions} from './pipeline-runner.js'
export {ConsoleReporter, type PipelineEvent, type Reporter} from './reporter.js'
