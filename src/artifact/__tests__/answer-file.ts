import {readFile} from 'node:fs/promises'
import test from 'ava'
import {parse as parseToml} from 'smol-toml'
import {buildInstallArtifact, raidLevelFor, renderAnswerFile, writeAnswerFile, type Identity} from '../answer-file.js'
import {resolveTopology} from '../../disks/topology.js'
import {Workspace} from '../../engine/workspace.js'
import {EmptyCredentialError} from '../../errors.js'
import {createTmpDir, disk} from '../../__tests__/helpers.js'

// plain objects for deep comparison
function parseAnswer(toml: string): Record<string, unknown> {
  const value: unknown = JSON.parse(JSON.stringify(parseToml(toml)))
  return typeof value === 'object' && value !== null ? {...value} : {}
}

const identity: Identity = {
  hostname: 'pve1',
  fqdn: 'pve1.example.com',
  email: 'ops@example.com',
  timezone: 'Europe/Paris',
  rootPassword: 'test-secret',
  keyboard: 'fr',
  country: 'fr'
}

const dhcp = {source: 'from-dhcp'} as const

// -- credential --------------------------------------------------------------

test('empty root password is rejected', t => {
  const decision = resolveTopology([disk('sda', 500)])
  t.throws(() => buildInstallArtifact({...identity, rootPassword: ''}, dhcp, decision), {instanceOf: EmptyCredentialError})
  t.throws(() => buildInstallArtifact({...identity, rootPassword: '  \t'}, dhcp, decision), {instanceOf: EmptyCredentialError})
})

// -- filesystem clause -------------------------------------------------------

test('one disk installs ext4 without a raid keyword', t => {
  const artifact = buildInstallArtifact(identity, dhcp, resolveTopology([disk('sda', 500)]))
  t.deepEqual(artifact.disk, {filesystem: 'ext4', diskList: ['/dev/sda']})
})

test('several disks install zfs with the raid keyword of their class', t => {
  const artifact = buildInstallArtifact(identity, dhcp, resolveTopology([disk('sda', 500), disk('sdb', 500)]))
  t.deepEqual(artifact.disk, {filesystem: 'zfs', redundancy: 'mirror', raid: 'raid1', diskList: ['/dev/sda', '/dev/sdb']})
})

test('raid keywords follow the redundancy class', t => {
  t.is(raidLevelFor('mirror'), 'raid1')
  t.is(raidLevelFor('striped-mirror'), 'raid10')
  t.is(raidLevelFor('parity-1'), 'raidz-1')
  t.is(raidLevelFor('parity-2'), 'raidz-2')
  t.is(raidLevelFor('parity-3'), 'raidz-3')
})

test('disk list follows the assigned order of a manual selection', t => {
  const inventory = [disk('sda', 500), disk('sdb', 500), disk('sdc', 500)]
  const artifact = buildInstallArtifact(identity, dhcp, resolveTopology(inventory, {kind: 'manual-subset', indexes: [3, 1]}))
  t.deepEqual(artifact.disk.diskList, ['/dev/sdc', '/dev/sda'])
})

test('artifact carries the identity and never reboots on error', t => {
  const artifact = buildInstallArtifact(identity, dhcp, resolveTopology([disk('sda', 500)]))
  t.deepEqual(artifact.global, {
    keyboard: 'fr',
    country: 'fr',
    fqdn: 'pve1.example.com',
    mailto: 'ops@example.com',
    timezone: 'Europe/Paris',
    rootPassword: 'test-secret',
    rebootOnError: false
  })
  t.true(Object.isFrozen(artifact))
})

// -- rendering ---------------------------------------------------------------

test('rendered answer file has the installer sections', t => {
  const inventory = [disk('sda', 500), disk('sdb', 500), disk('sdc', 500), disk('sdd', 500)]
  const toml = renderAnswerFile(buildInstallArtifact(identity, dhcp, resolveTopology(inventory)))
  t.deepEqual(parseAnswer(toml), {
    global: {
      keyboard: 'fr',
      country: 'fr',
      fqdn: 'pve1.example.com',
      mailto: 'ops@example.com',
      timezone: 'Europe/Paris',
      root_password: 'test-secret',
      reboot_on_error: false
    },
    network: {source: 'from-dhcp'},
    'disk-setup': {
      filesystem: 'zfs',
      disk_list: ['/dev/sda', '/dev/sdb', '/dev/sdc', '/dev/sdd'],
      zfs: {raid: 'raid10'}
    }
  })
  t.true(toml.endsWith('\n'))
})

test('ext4 answer file has no zfs table', t => {
  const toml = renderAnswerFile(buildInstallArtifact(identity, dhcp, resolveTopology([disk('nvme0n1', 1000)])))
  t.deepEqual(parseAnswer(toml)['disk-setup'], {filesystem: 'ext4', disk_list: ['/dev/nvme0n1']})
})

test('password with quotes survives serialization', t => {
  const tricky = 'p"a\\ss\'word'
  const toml = renderAnswerFile(buildInstallArtifact({...identity, rootPassword: tricky}, dhcp, resolveTopology([disk('sda', 500)])))
  t.deepEqual(parseAnswer(toml).global, {
    keyboard: 'fr',
    country: 'fr',
    fqdn: 'pve1.example.com',
    mailto: 'ops@example.com',
    timezone: 'Europe/Paris',
    root_password: tricky,
    reboot_on_error: false
  })
})

test('writeAnswerFile writes answer.toml in the workspace', async t => {
  const ws = await Workspace.open(await createTmpDir())
  const artifact = buildInstallArtifact(identity, dhcp, resolveTopology([disk('sda', 500)]))
  const path = await writeAnswerFile(ws, artifact)
  t.is(path, ws.path('answer.toml'))
  t.is(await readFile(path, 'utf8'), renderAnswerFile(artifact))
})
