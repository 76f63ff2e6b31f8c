import type {HostCapabilities, VirtualMachineRequest, VirtualMachineResult, VirtualSession} from './types.js'

/**
 * Log line from virtual machine output.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running transient virtual machines.
 *
 * Implementations:
 * - `QemuExecutor`: Uses qemu-system-x86_64
 *
 * The executor is responsible for:
 * - Attaching host disks to the machine
 * - Forwarding the guest's service port
 * - Capturing output to the request's log file
 * - Terminating every machine it started, on every exit path
 */
export abstract class VirtualMachineExecutor {
  /**
   * Verifies that the executor is available and functional.
   * @throws If the hypervisor is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Inspects firmware mode and hardware acceleration of the host.
   */
  abstract inspectHost(): Promise<HostCapabilities>

  /**
   * Runs a machine and blocks until it exits.
   * @param request - Machine configuration
   * @param onLogLine - Callback for real-time output
   * @returns Exit code, timestamps and the tail of the output
   */
  abstract run(request: VirtualMachineRequest, onLogLine?: OnLogLine): Promise<VirtualMachineResult>

  /**
   * Starts a detached machine and returns as soon as the process is running.
   * @throws VirtualMachineStartError if the process cannot be started
   */
  abstract start(request: VirtualMachineRequest, onLogLine?: OnLogLine): Promise<VirtualSession>

  /**
   * Kill every machine currently run by this process.
   * Called from signal handlers (SIGINT/SIGTERM).
   */
  abstract killRunningMachines(): Promise<void>
}
