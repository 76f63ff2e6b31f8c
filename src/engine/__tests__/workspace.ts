import {access, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {Workspace} from '../workspace.js'
import {StagingError, WorkspaceError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'

// -- open --------------------------------------------------------------------

test('open creates the root and template_files/', async t => {
  const root = join(await createTmpDir(), 'nested', 'workdir')
  const ws = await Workspace.open(root)
  t.is(ws.root, root)
  await t.notThrowsAsync(async () => access(join(root, 'template_files')))
})

test('open on an existing workspace keeps its files', async t => {
  const root = await createTmpDir()
  const first = await Workspace.open(root)
  await first.write('answer.toml', 'x')
  const second = await Workspace.open(root)
  t.true(await second.exists('answer.toml'))
})

// -- paths -------------------------------------------------------------------

test('path and stagingPath are well-known', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.open(root)
  t.is(ws.path('pve.iso'), join(root, 'pve.iso'))
  t.is(ws.stagingPath('pve.iso'), join(root, 'pve.iso.partial'))
})

test('templatePath rejects names that leave the directory', async t => {
  const ws = await Workspace.open(await createTmpDir())
  t.throws(() => ws.templatePath('../hosts'), {instanceOf: WorkspaceError})
  t.throws(() => ws.templatePath('a/b'), {instanceOf: WorkspaceError})
  t.is(ws.templatePath('99-proxmox.conf'), join(ws.root, 'template_files', '99-proxmox.conf'))
})

// -- write, commit, discard, remove ------------------------------------------

test('write returns the path of the written file', async t => {
  const ws = await Workspace.open(await createTmpDir())
  const path = await ws.write('answer.toml', 'content')
  t.is(path, ws.path('answer.toml'))
  t.is(await readFile(path, 'utf8'), 'content')
})

test('writeTemplate writes under template_files/', async t => {
  const ws = await Workspace.open(await createTmpDir())
  const path = await ws.writeTemplate('hosts', '127.0.0.1 localhost\n')
  t.is(path, join(ws.root, 'template_files', 'hosts'))
  t.is(await readFile(path, 'utf8'), '127.0.0.1 localhost\n')
})

test('commit moves the staged file into place', async t => {
  const ws = await Workspace.open(await createTmpDir())
  await writeFile(ws.stagingPath('pve.iso'), 'iso')
  const path = await ws.commit('pve.iso')
  t.is(await readFile(path, 'utf8'), 'iso')
  await t.throwsAsync(async () => access(ws.stagingPath('pve.iso')))
})

test('commit without a staged file throws StagingError', async t => {
  const ws = await Workspace.open(await createTmpDir())
  await t.throwsAsync(async () => ws.commit('pve.iso'), {instanceOf: StagingError})
})

test('discard removes only the staged copy', async t => {
  const ws = await Workspace.open(await createTmpDir())
  await ws.write('pve.iso', 'old')
  await writeFile(ws.stagingPath('pve.iso'), 'partial')
  await ws.discard('pve.iso')
  t.true(await ws.exists('pve.iso'))
  await t.throwsAsync(async () => access(ws.stagingPath('pve.iso')))
})

test('remove deletes file and staged copy, and tolerates absence', async t => {
  const ws = await Workspace.open(await createTmpDir())
  await ws.write('pve-autoinstall.iso', 'iso')
  await writeFile(ws.stagingPath('pve-autoinstall.iso'), 'partial')
  await ws.remove('pve-autoinstall.iso')
  t.false(await ws.exists('pve-autoinstall.iso'))
  await t.notThrowsAsync(async () => ws.remove('pve-autoinstall.iso'))
})
