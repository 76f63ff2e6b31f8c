import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {DiskDescriptor} from '../disks/inventory.js'
import type {ToolOptions, ToolResult, ToolRunner} from '../engine/tool.js'
import type {PipelineEvent, Reporter} from '../reporter.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'provisio-test-'))
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PipelineEvent[]} {
  const events: PipelineEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

const gib = 1024 ** 3

/**
 * Builds a disk descriptor; size in GiB.
 */
export function disk(name: string, sizeGib: number, model?: string): DiskDescriptor {
  return {path: `/dev/${name}`, name, sizeBytes: sizeGib * gib, model}
}

export type ToolCall = {file: string; args: string[]; options?: ToolOptions}

/**
 * Tool runner answering from a handler, recording every call.
 */
export function fakeToolRunner(
  handler: (file: string, args: string[]) => Partial<ToolResult> = () => ({})
): {runTool: ToolRunner; calls: ToolCall[]} {
  const calls: ToolCall[] = []
  const runTool: ToolRunner = async (file, args, options) => {
    calls.push({file, args, options})
    const result = handler(file, args)
    const exitCode = 'exitCode' in result ? result.exitCode : 0
    return {
      command: [file, ...args].join(' '),
      exitCode,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      failed: result.failed ?? exitCode !== 0
    }
  }

  return {runTool, calls}
}
