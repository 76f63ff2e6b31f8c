import {execaToolRunner, type ToolRunner} from '../engine/tool.js'
import {NoDisksFoundError, ProvisionError} from '../errors.js'

/**
 * Whole block device eligible for installation.
 */
export type DiskDescriptor = {
  /** Stable device path (e.g. /dev/nvme0n1) */
  readonly path: string;
  /** Kernel device name (e.g. nvme0n1) */
  readonly name: string;
  readonly sizeBytes: number;
  readonly model?: string;
}

/**
 * Source of the host's block devices.
 */
export type DiskInventory = {
  list(): Promise<DiskDescriptor[]>;
}

/** Whole-device names only: sda, vdb, hdc, nvme0n1 (never sda1 or nvme0n1p2). */
const wholeDevicePattern = /^(?:sd[a-z]+|vd[a-z]+|hd[a-z]+|nvme\d+n\d+)$/

type LsblkDevice = {
  name?: unknown;
  size?: unknown;
  model?: unknown;
  type?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isWholeDeviceName(name: string): boolean {
  return wholeDevicePattern.test(name)
}

/**
 * Parses `lsblk --json --bytes --nodeps` output into disk descriptors.
 * Partitions and unrecognized device kinds are dropped; the result is sorted by name.
 */
export function parseLsblk(json: string): DiskDescriptor[] {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (error) {
    throw new ProvisionError('INVENTORY_UNREADABLE', 'lsblk returned invalid JSON', {cause: error})
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.blockdevices)) {
    throw new ProvisionError('INVENTORY_UNREADABLE', 'lsblk output has no blockdevices array')
  }

  const devices: unknown[] = parsed.blockdevices
  const disks: DiskDescriptor[] = []
  for (const entry of devices) {
    if (!isRecord(entry)) {
      continue
    }

    const device: LsblkDevice = entry
    if (typeof device.name !== 'string' || !isWholeDeviceName(device.name)) {
      continue
    }

    if (device.type !== undefined && device.type !== 'disk') {
      continue
    }

    // util-linux < 2.33 prints sizes as strings even with --bytes
    const sizeBytes = typeof device.size === 'number' ? device.size : Number(device.size)
    if (!Number.isFinite(sizeBytes)) {
      continue
    }

    const model = typeof device.model === 'string' ? device.model.trim() : ''
    disks.push({
      path: `/dev/${device.name}`,
      name: device.name,
      sizeBytes,
      ...(model ? {model} : {})
    })
  }

  return disks.sort((a, b) => a.name.localeCompare(b.name))
}

/**
 * Disk inventory backed by `lsblk`.
 */
export class LsblkInventory implements DiskInventory {
  constructor(private readonly runTool: ToolRunner = execaToolRunner) {}

  async list(): Promise<DiskDescriptor[]> {
    const result = await this.runTool('lsblk', ['--json', '--bytes', '--nodeps', '--output', 'NAME,SIZE,MODEL,TYPE'])
    if (result.failed) {
      throw new ProvisionError('INVENTORY_UNREADABLE', `lsblk failed: ${result.stderr || `exit code ${String(result.exitCode)}`}`)
    }

    const disks = parseLsblk(result.stdout)
    if (disks.length === 0) {
      throw new NoDisksFoundError()
    }

    return disks
  }
}
