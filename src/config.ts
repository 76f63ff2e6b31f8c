import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from './errors.js'
import type {Identity} from './artifact/answer-file.js'
import type {SelectionMode} from './disks/topology.js'
import {defaultNameservers} from './remote/configurator.js'
import {defaultReadinessAttempts, defaultReadinessIntervalMs} from './engine/readiness.js'

/**
 * Network values given in the config file. Missing values are detected on the host.
 */
export type NetworkOverrides = {
  interfaceName?: string;
  ipv4Cidr?: string;
  ipv4Gateway?: string;
  macAddress?: string;
  ipv6Cidr?: string;
  privateSubnet: string;
}

export type ProvisionConfig = {
  identity: Identity;
  network: NetworkOverrides;
  disks: SelectionMode;
  image: {
    url: string;
    reuseDownload: boolean;
    skipPackages: boolean;
  };
  vm: {
    cpus: number;
    memoryMb: number;
    /** Host port forwarded to the installed system's SSH port */
    sshPort: number;
  };
  readiness: {
    attempts: number;
    intervalMs: number;
  };
  nameservers: string[];
}

/**
 * Values given on the command line or through the environment, applied over the file.
 */
export type ConfigOverrides = {
  rootPassword?: string;
  disks?: SelectionMode;
  skipPackages?: boolean;
}

export const defaultImageUrl = 'https://enterprise.proxmox.com/iso/proxmox-ve_8.3-1.iso'

export const defaultConfig: Omit<ProvisionConfig, 'identity'> & {identity: Omit<Identity, 'rootPassword'>} = {
  identity: {
    hostname: 'proxmox',
    fqdn: 'proxmox.example.com',
    email: 'admin@example.com',
    timezone: 'UTC',
    keyboard: 'en-us',
    country: 'us'
  },
  network: {
    privateSubnet: '192.168.1.10/24'
  },
  disks: {kind: 'auto-all'},
  image: {
    url: defaultImageUrl,
    reuseDownload: false,
    skipPackages: false
  },
  vm: {
    cpus: 4,
    memoryMb: 4096,
    sshPort: 5555
  },
  readiness: {
    attempts: defaultReadinessAttempts,
    intervalMs: defaultReadinessIntervalMs
  },
  nameservers: defaultNameservers
}

type Section = Record<string, unknown>

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(input: Section, key: string): Section {
  const value = input[key]
  if (value === undefined || value === null) {
    return {}
  }

  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be a mapping`)
  }

  return value
}

function optionalString(input: Section, key: string, path: string): string | undefined {
  const value = input[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ConfigError(`${path}.${key} must be a string`)
  }

  return value
}

function optionalBoolean(input: Section, key: string, path: string): boolean | undefined {
  const value = input[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path}.${key} must be a boolean`)
  }

  return value
}

function optionalPositiveInteger(input: Section, key: string, path: string): number | undefined {
  const value = input[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${path}.${key} must be a positive integer`)
  }

  return value
}

const hostnamePattern = /^[a-z\d]([a-z\d-]{0,61}[a-z\d])?$/i
const ipv4Pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/

function isIpv4(value: string): boolean {
  const match = ipv4Pattern.exec(value)
  return match !== null && match.slice(1).every(octet => Number(octet) <= 255)
}

function isIpv4Cidr(value: string): boolean {
  const [address, prefix, ...rest] = value.split('/')
  return rest.length === 0 && isIpv4(address) && prefix !== undefined && /^\d{1,2}$/.test(prefix) && Number(prefix) <= 32
}

function parseDisks(input: Section): SelectionMode {
  const mode = optionalString(input, 'mode', 'disks') ?? 'auto-all'
  switch (mode) {
    case 'auto-all': {
      return {kind: 'auto-all'}
    }

    case 'system-pair': {
      return {kind: 'auto-smallest-pair-for-system'}
    }

    case 'manual': {
      const {indexes} = input
      if (!Array.isArray(indexes) || indexes.length === 0) {
        throw new ConfigError('disks.indexes must be a non-empty list when disks.mode is manual')
      }

      const values: unknown[] = indexes
      return {
        kind: 'manual-subset',
        indexes: values.map(value => {
          if (typeof value !== 'number' || !Number.isInteger(value)) {
            throw new ConfigError('disks.indexes must contain integers')
          }

          return value
        })
      }
    }

    default: {
      throw new ConfigError(`disks.mode must be one of auto-all, system-pair, manual (got ${mode})`)
    }
  }
}

function parseNameservers(input: Section): string[] {
  const {nameservers} = input
  if (nameservers === undefined || nameservers === null) {
    return defaultConfig.nameservers
  }

  if (!Array.isArray(nameservers) || nameservers.length === 0) {
    throw new ConfigError('nameservers must be a non-empty list')
  }

  const values: unknown[] = nameservers
  return values.map(value => {
    if (typeof value !== 'string' || !isIpv4(value)) {
      throw new ConfigError(`nameservers: invalid IPv4 address ${String(value)}`)
    }

    return value
  })
}

/**
 * Validates a parsed config document and fills defaults.
 * The root password is never read from the file.
 */
export function parseConfig(document: unknown, overrides: ConfigOverrides = {}): ProvisionConfig {
  if (document !== undefined && document !== null && !isRecord(document)) {
    throw new ConfigError('Config must be a mapping')
  }

  const input: Section = isRecord(document) ? document : {}
  const identityInput = section(input, 'identity')
  if ('rootPassword' in identityInput) {
    throw new ConfigError('identity.rootPassword is not read from the config file; use --password or PROVISIO_ROOT_PASSWORD')
  }

  const hostname = optionalString(identityInput, 'hostname', 'identity') ?? defaultConfig.identity.hostname
  const identity: Identity = {
    hostname,
    // default domain follows the host name
    fqdn: optionalString(identityInput, 'fqdn', 'identity') ?? `${hostname}.example.com`,
    email: optionalString(identityInput, 'email', 'identity') ?? defaultConfig.identity.email,
    timezone: optionalString(identityInput, 'timezone', 'identity') ?? defaultConfig.identity.timezone,
    keyboard: optionalString(identityInput, 'keyboard', 'identity') ?? defaultConfig.identity.keyboard,
    country: optionalString(identityInput, 'country', 'identity') ?? defaultConfig.identity.country,
    rootPassword: overrides.rootPassword ?? ''
  }

  if (!hostnamePattern.test(identity.hostname)) {
    throw new ConfigError(`identity.hostname is not a valid host name: ${identity.hostname}`)
  }

  if (!identity.fqdn.startsWith(`${identity.hostname}.`)) {
    throw new ConfigError(`identity.fqdn must start with the host name (${identity.hostname}.)`)
  }

  const networkInput = section(input, 'network')
  const network: NetworkOverrides = {
    interfaceName: optionalString(networkInput, 'interface', 'network'),
    ipv4Cidr: optionalString(networkInput, 'ipv4Cidr', 'network'),
    ipv4Gateway: optionalString(networkInput, 'ipv4Gateway', 'network'),
    macAddress: optionalString(networkInput, 'macAddress', 'network'),
    ipv6Cidr: optionalString(networkInput, 'ipv6Cidr', 'network'),
    privateSubnet: optionalString(networkInput, 'privateSubnet', 'network') ?? defaultConfig.network.privateSubnet
  }

  if (!isIpv4Cidr(network.privateSubnet)) {
    throw new ConfigError(`network.privateSubnet must be an IPv4 CIDR: ${network.privateSubnet}`)
  }

  if (network.ipv4Cidr !== undefined && !isIpv4Cidr(network.ipv4Cidr)) {
    throw new ConfigError(`network.ipv4Cidr must be an IPv4 CIDR: ${network.ipv4Cidr}`)
  }

  if (network.ipv4Gateway !== undefined && !isIpv4(network.ipv4Gateway)) {
    throw new ConfigError(`network.ipv4Gateway must be an IPv4 address: ${network.ipv4Gateway}`)
  }

  const imageInput = section(input, 'image')
  const vmInput = section(input, 'vm')
  const readinessInput = section(input, 'readiness')

  return {
    identity,
    network,
    disks: overrides.disks ?? parseDisks(section(input, 'disks')),
    image: {
      url: optionalString(imageInput, 'url', 'image') ?? defaultConfig.image.url,
      reuseDownload: optionalBoolean(imageInput, 'reuseDownload', 'image') ?? defaultConfig.image.reuseDownload,
      skipPackages: overrides.skipPackages ?? optionalBoolean(imageInput, 'skipPackages', 'image') ?? defaultConfig.image.skipPackages
    },
    vm: {
      cpus: optionalPositiveInteger(vmInput, 'cpus', 'vm') ?? defaultConfig.vm.cpus,
      memoryMb: optionalPositiveInteger(vmInput, 'memoryMb', 'vm') ?? defaultConfig.vm.memoryMb,
      sshPort: optionalPositiveInteger(vmInput, 'sshPort', 'vm') ?? defaultConfig.vm.sshPort
    },
    readiness: {
      attempts: optionalPositiveInteger(readinessInput, 'attempts', 'readiness') ?? defaultConfig.readiness.attempts,
      intervalMs: optionalPositiveInteger(readinessInput, 'intervalMs', 'readiness') ?? defaultConfig.readiness.intervalMs
    },
    nameservers: parseNameservers(input)
  }
}

export const defaultConfigFile = 'provisio.yml'

/**
 * Loads a YAML config file.
 * Without a path, `provisio.yml` is read if present and the defaults apply otherwise.
 * @param overrides - Values from flags and environment, applied over the file
 */
export async function loadConfig(filePath: string | undefined, overrides: ConfigOverrides = {}): Promise<ProvisionConfig> {
  const effective: ConfigOverrides = {
    ...overrides,
    rootPassword: overrides.rootPassword ?? process.env.PROVISIO_ROOT_PASSWORD
  }

  const path = filePath ?? defaultConfigFile
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (filePath === undefined && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return parseConfig(undefined, effective)
    }

    throw new ConfigError(`Cannot read ${path}`, {cause: error})
  }

  let document: unknown
  try {
    document = parseYaml(content)
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}`, {cause: error})
  }

  return parseConfig(document, effective)
}
