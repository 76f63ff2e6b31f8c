import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {
  loadTemplateSources,
  renderTemplate,
  renderTemplateSet,
  templateNames,
  templateValues,
  type TemplateValues
} from '../templates.js'
import {MissingSubstitutionError, TemplateNotFoundError, UndeclaredTokenError} from '../../errors.js'
import type {NetworkSettings} from '../../network.js'
import {createTmpDir} from '../../__tests__/helpers.js'

const network: NetworkSettings = {
  interfaceName: 'enp0s31f6',
  ipv4Cidr: '203.0.113.10/26',
  ipv4Gateway: '203.0.113.1',
  macAddress: 'aa:bb:cc:dd:ee:ff',
  ipv6Cidr: '2001:db8:1:2::2/64',
  privateSubnet: '192.168.26.0/24'
}

const host = {hostname: 'pve1', fqdn: 'pve1.example.com'}

// -- renderTemplate ----------------------------------------------------------

test('renderTemplate replaces every occurrence', t => {
  const output = renderTemplate('t', '{{A}}-{{B}}-{{A}}', ['A', 'B'], {A: 'x', B: 'y'})
  t.is(output, 'x-y-x')
})

test('renderTemplate accepts empty values', t => {
  t.is(renderTemplate('t', '[{{A}}]', ['A'], {A: ''}), '[]')
})

test('renderTemplate fails on a declared token without a value', t => {
  const error = t.throws(() => renderTemplate('hosts', '{{A}} {{B}}', ['A', 'B'], {A: 'x'}), {instanceOf: MissingSubstitutionError})
  t.deepEqual(error?.tokens, ['B'])
  t.is(error?.template, 'hosts')
})

test('renderTemplate fails on a token the schema does not declare', t => {
  const error = t.throws(() => renderTemplate('hosts', '{{A}} {{TYPO}}', ['A'], {A: 'x', TYPO: 'y'}), {instanceOf: UndeclaredTokenError})
  t.deepEqual(error?.tokens, ['TYPO'])
})

test('renderTemplate requires declared tokens even when absent from the source', t => {
  t.throws(() => renderTemplate('t', 'static', ['A'], {}), {instanceOf: MissingSubstitutionError})
})

test('renderTemplate leaves single braces alone', t => {
  t.is(renderTemplate('t', '{A} {{A}}', ['A'], {A: 'x'}), '{A} x')
})

// -- shipped templates -------------------------------------------------------

test('templateValues derives the bridge and IPv6 values', t => {
  const values = templateValues(host, network)
  t.deepEqual(values.hosts, {
    MAIN_IPV4: '203.0.113.10',
    FQDN: 'pve1.example.com',
    HOSTNAME: 'pve1',
    MAIN_IPV6: '2001:db8:1:2::2'
  })
  t.is(values.interfaces.PRIVATE_IP_CIDR, '192.168.26.1/24')
  t.is(values.interfaces.FIRST_IPV6_CIDR, '2001:db8:1:2:1::1/80')
})

test('templateValues without IPv6 leaves the IPv6 values empty', t => {
  const values = templateValues(host, {...network, ipv6Cidr: ''})
  t.is(values.hosts.MAIN_IPV6, '')
  t.is(values.interfaces.IPV6_CIDR, '')
  t.is(values.interfaces.FIRST_IPV6_CIDR, '')
})

test('shipped templates render completely', async t => {
  const rendered = renderTemplateSet(await loadTemplateSources(), templateValues(host, network))
  t.deepEqual(rendered.map(template => [template.name, template.destination]), [
    ['hosts', '/etc/hosts'],
    ['interfaces', '/etc/network/interfaces'],
    ['99-proxmox.conf', '/etc/sysctl.d/99-proxmox.conf'],
    ['sources.list', '/etc/apt/sources.list']
  ])

  for (const template of rendered) {
    t.false(template.content.includes('{{'), template.name)
  }

  const hosts = rendered.find(template => template.name === 'hosts')
  t.true(hosts?.content.split('\n').includes('203.0.113.10 pve1.example.com pve1'))
  const interfaces = rendered.find(template => template.name === 'interfaces')
  t.true(interfaces?.content.split('\n').includes('  address 192.168.26.1/24'))
})

test('a template with a stray token fails the whole set', async t => {
  const dir = await createTmpDir()
  const sources = await loadTemplateSources()
  for (const name of templateNames) {
    await writeFile(join(dir, name), sources[name])
  }

  await writeFile(join(dir, 'sources.list'), 'deb {{MIRROR}} bookworm main\n')
  const values: TemplateValues = templateValues(host, network)
  await t.throwsAsync(async () => renderTemplateSet(await loadTemplateSources(dir), values), {instanceOf: UndeclaredTokenError})
})

test('loadTemplateSources reports a missing template', async t => {
  const dir = await createTmpDir()
  const error = await t.throwsAsync(async () => loadTemplateSources(dir), {instanceOf: TemplateNotFoundError})
  t.is(error?.template, 'hosts')
})
