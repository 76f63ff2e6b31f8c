import {stringify as stringifyToml} from 'smol-toml'
import {EmptyCredentialError} from '../errors.js'
import type {Workspace} from '../engine/workspace.js'
import type {RedundancyClass, TopologyDecision} from '../disks/topology.js'

/**
 * Identity of the installed system.
 */
export type Identity = {
  hostname: string;
  fqdn: string;
  /** Contact address for system notifications */
  email: string;
  timezone: string;
  /** Root password, also used for the post-install SSH session */
  rootPassword: string;
  keyboard: string;
  country: string;
}

/**
 * Network configuration mode of the installer.
 * The installer runs behind QEMU user networking, so it always takes its address from DHCP.
 */
export type InstallNetwork = {
  source: 'from-dhcp';
}

export type ZfsRaidLevel = 'raid1' | 'raid10' | 'raidz-1' | 'raidz-2' | 'raidz-3'

export type DiskSetup =
  | {filesystem: 'ext4'; diskList: string[]}
  | {filesystem: 'zfs'; redundancy: Exclude<RedundancyClass, 'single'>; raid: ZfsRaidLevel; diskList: string[]}

/**
 * Declarative description of an unattended installation.
 */
export type InstallArtifact = {
  readonly global: {
    keyboard: string;
    country: string;
    fqdn: string;
    mailto: string;
    timezone: string;
    rootPassword: string;
    rebootOnError: boolean;
  };
  readonly network: InstallNetwork;
  readonly disk: DiskSetup;
}

const raidLevels: Record<Exclude<RedundancyClass, 'single'>, ZfsRaidLevel> = {
  mirror: 'raid1',
  'striped-mirror': 'raid10',
  'parity-1': 'raidz-1',
  'parity-2': 'raidz-2',
  'parity-3': 'raidz-3'
}

export function raidLevelFor(redundancy: Exclude<RedundancyClass, 'single'>): ZfsRaidLevel {
  return raidLevels[redundancy]
}

function diskSetup(decision: TopologyDecision): DiskSetup {
  const diskList = decision.assigned.map(disk => disk.path)
  const {redundancy} = decision
  if (redundancy === 'single') {
    return {filesystem: 'ext4', diskList}
  }

  return {filesystem: 'zfs', redundancy, raid: raidLevelFor(redundancy), diskList}
}

/**
 * Builds the answer for an unattended install.
 * @throws EmptyCredentialError when the root password is empty
 */
export function buildInstallArtifact(identity: Identity, network: InstallNetwork, decision: TopologyDecision): InstallArtifact {
  if (identity.rootPassword.trim() === '') {
    throw new EmptyCredentialError()
  }

  return Object.freeze({
    global: {
      keyboard: identity.keyboard,
      country: identity.country,
      fqdn: identity.fqdn,
      mailto: identity.email,
      timezone: identity.timezone,
      rootPassword: identity.rootPassword,
      rebootOnError: false
    },
    network: {...network},
    disk: diskSetup(decision)
  })
}

/**
 * Serializes an artifact in the installer's answer file format (TOML).
 */
export function renderAnswerFile(artifact: InstallArtifact): string {
  const {global, network, disk} = artifact
  const diskSection = disk.filesystem === 'zfs'
    ? {filesystem: disk.filesystem, disk_list: disk.diskList, zfs: {raid: disk.raid}}
    : {filesystem: disk.filesystem, disk_list: disk.diskList}

  return stringifyToml({
    global: {
      keyboard: global.keyboard,
      country: global.country,
      fqdn: global.fqdn,
      mailto: global.mailto,
      timezone: global.timezone,
      root_password: global.rootPassword,
      reboot_on_error: global.rebootOnError
    },
    network: {source: network.source},
    'disk-setup': diskSection
  }) + '\n'
}

/**
 * Writes the answer file to its well-known location in the workspace.
 * @returns Path of the written file
 */
export async function writeAnswerFile(workspace: Workspace, artifact: InstallArtifact): Promise<string> {
  return workspace.write('answer.toml', renderAnswerFile(artifact))
}
