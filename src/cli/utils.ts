import type {Command} from 'commander'
import {InvalidManualSelectionError} from '../errors.js'
import type {SelectionMode} from '../disks/topology.js'
import {parseIndexList} from '../utils.js'

export type GlobalOptions = {
  workdir: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Disk selection from the `--disks` and `--system-pair` flags.
 * @returns undefined when neither flag is given
 */
export function selectionFromFlags(options: {disks?: string; systemPair?: boolean}): SelectionMode | undefined {
  if (options.disks !== undefined && options.systemPair) {
    throw new InvalidManualSelectionError('--disks and --system-pair cannot be combined')
  }

  if (options.disks !== undefined) {
    const indexes = parseIndexList(options.disks)
    if (!indexes || indexes.length === 0) {
      throw new InvalidManualSelectionError(`Invalid disk list: "${options.disks}" (expected 1-based indexes such as 1,2)`)
    }

    return {kind: 'manual-subset', indexes}
  }

  return options.systemPair ? {kind: 'auto-smallest-pair-for-system'} : undefined
}
