import {InvalidManualSelectionError, NoDisksFoundError} from '../errors.js'
import type {DiskDescriptor} from './inventory.js'

/**
 * Data-protection layout applied across the assigned disks.
 */
export type RedundancyClass = 'single' | 'mirror' | 'striped-mirror' | 'parity-1' | 'parity-2' | 'parity-3'

/**
 * How the disks are selected for the install target.
 *
 * - `auto-all`: every disk is assigned
 * - `auto-smallest-pair-for-system`: the two smallest disks form a mirror, the others are left untouched
 * - `manual-subset`: 1-based indexes into the inventory, in the order given
 */
export type SelectionMode =
  | {kind: 'auto-all'}
  | {kind: 'auto-smallest-pair-for-system'}
  | {kind: 'manual-subset'; indexes: number[]}

export type TopologyDecision = {
  readonly redundancy: RedundancyClass;
  /** Disks the installer will erase, in pairing order */
  readonly assigned: readonly DiskDescriptor[];
  /** Disks left untouched */
  readonly excluded: readonly DiskDescriptor[];
  readonly mode: SelectionMode['kind'];
}

/**
 * Redundancy class for a number of assigned disks.
 *
 * The table is deliberately not monotonic in fault tolerance: four disks
 * use striped mirrors for performance while five fall back to single parity.
 */
export function redundancyFor(count: number): RedundancyClass {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Disk count must be a positive integer, got ${count}`)
  }

  switch (count) {
    case 1: {
      return 'single'
    }

    case 2: {
      return 'mirror'
    }

    case 3:
    case 5: {
      return 'parity-1'
    }

    case 4: {
      return 'striped-mirror'
    }

    default: {
      return count < 10 ? 'parity-2' : 'parity-3'
    }
  }
}

function decision(
  redundancy: RedundancyClass,
  assigned: DiskDescriptor[],
  excluded: DiskDescriptor[],
  mode: SelectionMode['kind']
): TopologyDecision {
  return Object.freeze({
    redundancy,
    assigned: Object.freeze(assigned),
    excluded: Object.freeze(excluded),
    mode
  })
}

function selectManual(disks: readonly DiskDescriptor[], indexes: number[]): DiskDescriptor[] {
  if (indexes.length === 0) {
    throw new InvalidManualSelectionError('Manual disk selection is empty')
  }

  const seen = new Set<number>()
  const selected: DiskDescriptor[] = []
  for (const index of indexes) {
    if (!Number.isInteger(index) || index < 1 || index > disks.length) {
      throw new InvalidManualSelectionError(`Disk index ${index} is outside 1-${disks.length}`)
    }

    if (seen.has(index)) {
      throw new InvalidManualSelectionError(`Disk index ${index} is selected more than once`)
    }

    seen.add(index)
    selected.push(disks[index - 1])
  }

  return selected
}

/**
 * Decides which disks the installer gets and how they are combined.
 * Pure: the inventory is read once by the caller.
 */
export function resolveTopology(disks: readonly DiskDescriptor[], mode: SelectionMode = {kind: 'auto-all'}): TopologyDecision {
  if (disks.length === 0) {
    throw new NoDisksFoundError()
  }

  switch (mode.kind) {
    case 'auto-all': {
      return decision(redundancyFor(disks.length), [...disks], [], mode.kind)
    }

    case 'auto-smallest-pair-for-system': {
      // Array#sort is stable, so equal sizes keep inventory order
      const bySize = [...disks].sort((a, b) => a.sizeBytes - b.sizeBytes)
      const assigned = bySize.slice(0, 2)
      const excluded = disks.filter(disk => !assigned.includes(disk))
      return decision(redundancyFor(assigned.length), assigned, excluded, mode.kind)
    }

    case 'manual-subset': {
      const assigned = selectManual(disks, mode.indexes)
      const excluded = disks.filter(disk => !assigned.includes(disk))
      return decision(redundancyFor(assigned.length), assigned, excluded, mode.kind)
    }
  }
}
