import process from 'node:process'
import {once} from 'node:events'
import {createWriteStream, type WriteStream} from 'node:fs'
import {access} from 'node:fs/promises'
import {setTimeout} from 'node:timers/promises'
import {execa} from 'execa'
import {VirtualizationNotAvailableError, VirtualMachineCleanupError, VirtualMachineStartError} from '../errors.js'
import {VirtualMachineExecutor, type OnLogLine} from './executor.js'
import type {HostCapabilities, VirtualMachineRequest, VirtualMachineResult, VirtualSession} from './types.js'

type QemuProcess = ReturnType<typeof execa>

export type QemuExecutorOptions = {
  /** Hypervisor binary (default: qemu-system-x86_64) */
  binary?: string;
  /** UEFI firmware image passed with -bios in UEFI mode */
  firmwarePath?: string;
  /** Directory whose presence means the host booted through UEFI */
  efiDir?: string;
  /** KVM device whose presence enables hardware acceleration */
  kvmDevice?: string;
  /** Grace period between SIGTERM and SIGKILL on teardown */
  killGraceMs?: number;
  /** Bound on waiting for a killed machine to go away */
  teardownTimeoutMs?: number;
}

const maxTailLines = 50

/**
 * Build a minimal environment for the hypervisor process.
 * Only PATH, HOME and locale settings are kept.
 */
function qemuEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key === 'LANG' || key.startsWith('LC_'))) {
      env[key] = value
    }
  }

  return env
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/**
 * Command-line arguments of qemu-system-x86_64 for a request.
 */
export function buildQemuArgs(request: VirtualMachineRequest, firmwarePath = '/usr/share/ovmf/OVMF.fd'): string[] {
  const args: string[] = []

  // -cpu host needs KVM; pure emulation falls back to the widest emulated model
  if (request.capabilities.acceleration) {
    args.push('-enable-kvm', '-cpu', 'host')
  } else {
    args.push('-cpu', 'max')
  }

  if (request.capabilities.uefi) {
    args.push('-bios', firmwarePath)
  }

  args.push('-smp', String(request.cpus), '-m', String(request.memoryMb))

  if (request.networking.mode === 'forwarded-port') {
    const {hostPort, guestPort} = request.networking
    args.push(
      '-device', 'e1000,netdev=net0',
      '-netdev', `user,id=net0,hostfwd=tcp::${hostPort}-:${guestPort}`
    )
  }

  if (request.cdrom) {
    args.push('-boot', 'd', '-cdrom', request.cdrom)
  }

  for (const disk of request.disks) {
    args.push('-drive', `file=${disk},format=raw,media=disk,if=virtio`)
  }

  if (request.noReboot) {
    args.push('-no-reboot')
  }

  args.push('-display', 'none')
  return args
}

/**
 * Keeps the last lines of a machine's output for error reports.
 */
class LogTail {
  private readonly lines: string[] = []

  push(line: string): void {
    this.lines.push(line)
    if (this.lines.length > maxTailLines) {
      this.lines.shift()
    }
  }

  toString(): string {
    return this.lines.join('\n')
  }
}

async function closeStream(stream: WriteStream): Promise<void> {
  await new Promise<void>(resolve => {
    stream.end(() => {
      resolve()
    })
  })
}

/**
 * Stream stdout/stderr of a machine into its log file, a tail buffer and a callback.
 */
async function captureOutput(proc: QemuProcess, logFile: WriteStream, tail: LogTail, onLogLine?: OnLogLine): Promise<void> {
  const pump = async (stream: 'stdout' | 'stderr') => {
    try {
      for await (const chunk of proc.iterable({from: stream})) {
        const line = String(chunk)
        logFile.write(`${line}\n`)
        tail.push(line)
        onLogLine?.({stream, line})
      }
    } catch (error) {
      // The exit result carries the failure; keep a trace next to the output
      const message = error instanceof Error ? error.message : String(error)
      logFile.write(`[${stream} capture stopped: ${message}]\n`)
    }
  }

  await Promise.all([pump('stdout'), pump('stderr')])
}

class QemuSession implements VirtualSession {
  readonly pid: number
  readonly hostPort?: number
  readonly guestPort?: number
  private readonly exit: Promise<number | undefined>
  private exited = false
  private released = false

  constructor(
    private readonly proc: QemuProcess,
    pid: number,
    readonly name: string,
    readonly logPath: string,
    readonly uefi: boolean,
    request: VirtualMachineRequest,
    private readonly tail: LogTail,
    output: Promise<void>,
    logFile: WriteStream,
    private readonly teardownTimeoutMs: number,
    onExit: () => void
  ) {
    this.pid = pid
    if (request.networking.mode === 'forwarded-port') {
      this.hostPort = request.networking.hostPort
      this.guestPort = request.networking.guestPort
    }

    this.exit = (async () => {
      const result = await proc
      await output
      await closeStream(logFile)
      this.exited = true
      onExit()
      return result.exitCode
    })()
  }

  get disposed(): boolean {
    return this.exited || this.released
  }

  get log(): string {
    return this.tail.toString()
  }

  async waitForExit(): Promise<number | undefined> {
    return this.exit
  }

  async dispose(): Promise<void> {
    if (this.released) {
      return
    }

    this.released = true
    if (this.exited) {
      return
    }

    this.proc.kill('SIGTERM')
    const exited = await Promise.race([
      this.exit.then(() => true),
      setTimeout(this.teardownTimeoutMs, false, {ref: false})
    ])
    if (!exited) {
      throw new VirtualMachineCleanupError(this.name)
    }
  }
}

/**
 * Runs virtual machines with qemu-system-x86_64.
 */
export class QemuExecutor extends VirtualMachineExecutor {
  private readonly env = qemuEnv()
  private readonly binary: string
  private readonly firmwarePath: string
  private readonly efiDir: string
  private readonly kvmDevice: string
  private readonly killGraceMs: number
  private readonly teardownTimeoutMs: number
  private readonly activeProcesses = new Set<QemuProcess>()

  constructor(options: QemuExecutorOptions = {}) {
    super()
    this.binary = options.binary ?? 'qemu-system-x86_64'
    this.firmwarePath = options.firmwarePath ?? '/usr/share/ovmf/OVMF.fd'
    this.efiDir = options.efiDir ?? '/sys/firmware/efi'
    this.kvmDevice = options.kvmDevice ?? '/dev/kvm'
    this.killGraceMs = options.killGraceMs ?? 10_000
    this.teardownTimeoutMs = options.teardownTimeoutMs ?? 30_000
  }

  async check(): Promise<void> {
    try {
      await execa(this.binary, ['--version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new VirtualizationNotAvailableError(this.binary, {cause: error})
    }
  }

  async inspectHost(): Promise<HostCapabilities> {
    const [uefi, acceleration] = await Promise.all([pathExists(this.efiDir), pathExists(this.kvmDevice)])
    return {uefi, acceleration}
  }

  /**
   * Kill every machine started by this executor that is still running.
   */
  async killRunningMachines(): Promise<void> {
    const running = [...this.activeProcesses]
    for (const proc of running) {
      proc.kill('SIGKILL')
    }

    await Promise.all(running)
  }

  async run(request: VirtualMachineRequest, onLogLine?: OnLogLine): Promise<VirtualMachineResult> {
    const startedAt = new Date()
    const tail = new LogTail()
    const logFile = createWriteStream(request.logPath)
    const proc = this.spawn(request)

    try {
      await captureOutput(proc, logFile, tail, onLogLine)
      const result = await proc
      return {
        exitCode: result.exitCode,
        startedAt,
        finishedAt: new Date(),
        log: tail.toString(),
        // a machine killed by a signal did run; only a spawn failure is an error
        error: result.failed && result.exitCode === undefined && result.signal === undefined ? result.shortMessage : undefined
      }
    } finally {
      this.activeProcesses.delete(proc)
      await closeStream(logFile)
    }
  }

  async start(request: VirtualMachineRequest, onLogLine?: OnLogLine): Promise<VirtualSession> {
    const tail = new LogTail()
    const logFile = createWriteStream(request.logPath)
    const proc = this.spawn(request)
    const output = captureOutput(proc, logFile, tail, onLogLine)

    try {
      await once(proc, 'spawn')
    } catch (error) {
      await this.abandon(proc, output, logFile)
      throw new VirtualMachineStartError(`Failed to start ${request.name}`, {cause: error})
    }

    const {pid} = proc
    if (pid === undefined) {
      proc.kill('SIGKILL')
      await this.abandon(proc, output, logFile)
      throw new VirtualMachineStartError(`Failed to start ${request.name}: no process id`)
    }

    return new QemuSession(
      proc,
      pid,
      request.name,
      request.logPath,
      request.capabilities.uefi,
      request,
      tail,
      output,
      logFile,
      this.teardownTimeoutMs,
      () => this.activeProcesses.delete(proc)
    )
  }

  /**
   * Forget a machine that never started and release its log file.
   */
  private async abandon(proc: QemuProcess, output: Promise<void>, logFile: WriteStream): Promise<void> {
    this.activeProcesses.delete(proc)
    await proc
    await output
    await closeStream(logFile)
  }

  private spawn(request: VirtualMachineRequest): QemuProcess {
    const proc = execa(this.binary, buildQemuArgs(request, this.firmwarePath), {
      env: this.env,
      extendEnv: false,
      reject: false,
      stdin: 'ignore',
      forceKillAfterDelay: this.killGraceMs
    })
    this.activeProcesses.add(proc)
    return proc
  }
}
