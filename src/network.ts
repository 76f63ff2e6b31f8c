import {execaToolRunner, type ToolRunner} from './engine/tool.js'
import {ConfigError, ProvisionError} from './errors.js'

/**
 * Public network settings of the target machine, written into its
 * interfaces and hosts files.
 */
export type NetworkSettings = {
  /** Interface name as the installed system will see it */
  interfaceName: string;
  /** Main IPv4 address with prefix length (e.g. 203.0.113.10/26) */
  ipv4Cidr: string;
  ipv4Gateway: string;
  macAddress: string;
  /** Main IPv6 address with prefix length, empty when the host has none */
  ipv6Cidr: string;
  /** Private bridge subnet (e.g. 192.168.1.10/24) */
  privateSubnet: string;
}

export type DetectedNetwork = Omit<NetworkSettings, 'privateSubnet'>

type IpRoute = {dst?: unknown; gateway?: unknown; dev?: unknown}
type IpAddrInfo = {family?: unknown; local?: unknown; prefixlen?: unknown; scope?: unknown}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseArray(json: string, command: string): Array<Record<string, unknown>> {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (error) {
    throw new ProvisionError('NETWORK_DETECTION_FAILED', `${command} returned invalid JSON`, {cause: error})
  }

  if (!Array.isArray(parsed)) {
    throw new ProvisionError('NETWORK_DETECTION_FAILED', `${command} did not return an array`)
  }

  const entries: unknown[] = parsed
  return entries.filter(isRecord)
}

/**
 * Reads the default route from `ip -json route show default`.
 */
export function parseDefaultRoute(json: string): {interfaceName: string; gateway: string} | undefined {
  for (const entry of parseArray(json, 'ip route')) {
    const route: IpRoute = entry
    if (typeof route.dev === 'string' && typeof route.gateway === 'string') {
      return {interfaceName: route.dev, gateway: route.gateway}
    }
  }

  return undefined
}

/**
 * Reads the MAC address and global addresses of an interface
 * from `ip -json address show dev <name>`.
 */
export function parseInterfaceAddresses(json: string): {macAddress: string; ipv4Cidr: string; ipv6Cidr: string} {
  const [link] = parseArray(json, 'ip address')
  if (!link) {
    throw new ProvisionError('NETWORK_DETECTION_FAILED', 'ip address returned no interface')
  }

  const macAddress = typeof link.address === 'string' ? link.address : ''
  let ipv4Cidr = ''
  let ipv6Cidr = ''
  const infos: unknown[] = Array.isArray(link.addr_info) ? link.addr_info : []
  for (const item of infos) {
    if (!isRecord(item)) {
      continue
    }

    const info: IpAddrInfo = item
    if (info.scope !== 'global' || typeof info.local !== 'string' || typeof info.prefixlen !== 'number') {
      continue
    }

    if (info.family === 'inet' && !ipv4Cidr) {
      ipv4Cidr = `${info.local}/${info.prefixlen}`
    } else if (info.family === 'inet6' && !ipv6Cidr) {
      ipv6Cidr = `${info.local}/${info.prefixlen}`
    }
  }

  return {macAddress, ipv4Cidr, ipv6Cidr}
}

/**
 * Detects the public network settings of the rescue system.
 * @param interfaceName - Interface to inspect (default: the one carrying the default route)
 */
export async function detectNetwork(interfaceName?: string, runTool: ToolRunner = execaToolRunner): Promise<DetectedNetwork> {
  const routes = await runTool('ip', ['-json', 'route', 'show', 'default'])
  if (routes.failed) {
    throw new ProvisionError('NETWORK_DETECTION_FAILED', `ip route failed: ${routes.stderr}`)
  }

  const route = parseDefaultRoute(routes.stdout)
  const name = interfaceName ?? route?.interfaceName
  if (!name) {
    throw new ProvisionError('NETWORK_DETECTION_FAILED', 'No default route found; set network.interface in the config')
  }

  const addresses = await runTool('ip', ['-json', 'address', 'show', 'dev', name])
  if (addresses.failed) {
    throw new ProvisionError('NETWORK_DETECTION_FAILED', `ip address failed for ${name}: ${addresses.stderr}`)
  }

  return {
    interfaceName: name,
    ipv4Gateway: route?.gateway ?? '',
    ...parseInterfaceAddresses(addresses.stdout)
  }
}

/**
 * Address part of a CIDR string.
 */
export function addressOf(cidr: string): string {
  return cidr.split('/')[0]
}

/**
 * Expands an IPv6 address to its eight groups (without zero padding).
 */
export function expandIpv6(address: string): string[] {
  const parts = address.split('::')
  if (parts.length === 1) {
    return address.split(':')
  }

  const [head, tail] = parts
  const headGroups = head ? head.split(':') : []
  const tailGroups = tail ? tail.split(':') : []
  const fill = Array.from({length: Math.max(0, 8 - headGroups.length - tailGroups.length)}, () => '0')
  return [...headGroups, ...fill, ...tailGroups]
}

/**
 * First address of the routed /80 carved out of the host's /64, given to the
 * private bridge. Empty when the host has no IPv6.
 */
export function firstIpv6Cidr(ipv6Cidr: string): string {
  if (!ipv6Cidr) {
    return ''
  }

  const groups = expandIpv6(addressOf(ipv6Cidr))
  if (groups.length !== 8) {
    throw new ConfigError(`Invalid IPv6 address: ${ipv6Cidr}`)
  }

  return `${groups.slice(0, 4).join(':')}:1::1/80`
}

/**
 * Gateway address of the private bridge: first host of the /24 containing
 * the subnet address, keeping the subnet's prefix length.
 */
export function privateIpCidr(privateSubnet: string): string {
  const match = /^(\d{1,3}\.\d{1,3}\.\d{1,3})\.\d{1,3}\/(\d{1,2})$/.exec(privateSubnet)
  if (!match) {
    throw new ConfigError(`Invalid private subnet: ${privateSubnet}`)
  }

  return `${match[1]}.1/${match[2]}`
}
