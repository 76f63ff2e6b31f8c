import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {fileURLToPath} from 'node:url'
import {MissingSubstitutionError, TemplateNotFoundError, UndeclaredTokenError} from '../errors.js'
import {addressOf, firstIpv6Cidr, privateIpCidr, type NetworkSettings} from '../network.js'

export type TemplateSchema = {
  /** Path of the rendered file on the target */
  destination: string;
  /** Tokens the template may contain, each of which needs a value */
  tokens: readonly string[];
}

/**
 * Configuration files pushed to the installed system, with the `{{TOKEN}}`
 * placeholders each one declares.
 */
export const templateSchemas = {
  hosts: {
    destination: '/etc/hosts',
    tokens: ['MAIN_IPV4', 'FQDN', 'HOSTNAME', 'MAIN_IPV6']
  },
  interfaces: {
    destination: '/etc/network/interfaces',
    tokens: [
      'INTERFACE_NAME',
      'MAIN_IPV4_CIDR',
      'MAIN_IPV4_GW',
      'MAC_ADDRESS',
      'IPV6_CIDR',
      'PRIVATE_IP_CIDR',
      'PRIVATE_SUBNET',
      'FIRST_IPV6_CIDR'
    ]
  },
  '99-proxmox.conf': {
    destination: '/etc/sysctl.d/99-proxmox.conf',
    tokens: []
  },
  'sources.list': {
    destination: '/etc/apt/sources.list',
    tokens: []
  }
} as const satisfies Record<string, TemplateSchema>

export type TemplateName = keyof typeof templateSchemas

export type TemplateToken<N extends TemplateName> = (typeof templateSchemas)[N]['tokens'][number]

/** Substitution values, one complete mapping per template. */
export type TemplateValues = {[N in TemplateName]: Record<TemplateToken<N>, string>}

export type TemplateSources = Record<TemplateName, string>

export type RenderedTemplate = {
  name: TemplateName;
  destination: string;
  content: string;
}

export const templateNames: readonly TemplateName[] = ['hosts', 'interfaces', '99-proxmox.conf', 'sources.list']

export const defaultTemplatesDir = fileURLToPath(new URL('../../templates/', import.meta.url))

const tokenPattern = /\{\{([^{}]*)\}\}/g

/**
 * Replaces every `{{TOKEN}}` of a template source.
 *
 * Fails closed: a token found in the source that the schema does not declare,
 * or a declared token without a value, is an error. Empty strings are valid values.
 */
export function renderTemplate(
  name: string,
  source: string,
  tokens: readonly string[],
  values: Readonly<Record<string, string | undefined>>
): string {
  const declared = new Set(tokens)
  const found = new Set([...source.matchAll(tokenPattern)].map(match => match[1]))

  const undeclared = [...found].filter(token => !declared.has(token))
  if (undeclared.length > 0) {
    throw new UndeclaredTokenError(name, undeclared)
  }

  const substitutions = new Map<string, string>()
  const missing: string[] = []
  for (const token of tokens) {
    const value = values[token]
    if (typeof value === 'string') {
      substitutions.set(token, value)
    } else {
      missing.push(token)
    }
  }

  if (missing.length > 0) {
    throw new MissingSubstitutionError(name, missing)
  }

  return source.replaceAll(tokenPattern, (match, token: string) => substitutions.get(token) ?? match)
}

async function readSource(dir: string, name: TemplateName): Promise<string> {
  const path = join(dir, name)
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    throw new TemplateNotFoundError(name, path, {cause: error})
  }
}

/**
 * Reads the source of every template from a directory.
 */
export async function loadTemplateSources(dir: string = defaultTemplatesDir): Promise<TemplateSources> {
  return {
    hosts: await readSource(dir, 'hosts'),
    interfaces: await readSource(dir, 'interfaces'),
    '99-proxmox.conf': await readSource(dir, '99-proxmox.conf'),
    'sources.list': await readSource(dir, 'sources.list')
  }
}

/**
 * Renders every template with its values.
 */
export function renderTemplateSet(sources: TemplateSources, values: TemplateValues): RenderedTemplate[] {
  return templateNames.map(name => {
    const schema: TemplateSchema = templateSchemas[name]
    const templateValues: Readonly<Record<string, string>> = values[name]
    return {
      name,
      destination: schema.destination,
      content: renderTemplate(name, sources[name], schema.tokens, templateValues)
    }
  })
}

/**
 * Substitution values for the shipped templates.
 */
export function templateValues(host: {hostname: string; fqdn: string}, network: NetworkSettings): TemplateValues {
  return {
    hosts: {
      MAIN_IPV4: addressOf(network.ipv4Cidr),
      FQDN: host.fqdn,
      HOSTNAME: host.hostname,
      MAIN_IPV6: network.ipv6Cidr ? addressOf(network.ipv6Cidr) : ''
    },
    interfaces: {
      INTERFACE_NAME: network.interfaceName,
      MAIN_IPV4_CIDR: network.ipv4Cidr,
      MAIN_IPV4_GW: network.ipv4Gateway,
      MAC_ADDRESS: network.macAddress,
      IPV6_CIDR: network.ipv6Cidr,
      PRIVATE_IP_CIDR: privateIpCidr(network.privateSubnet),
      PRIVATE_SUBNET: network.privateSubnet,
      FIRST_IPV6_CIDR: firstIpv6Cidr(network.ipv6Cidr)
    },
    '99-proxmox.conf': {},
    'sources.list': {}
  }
}
