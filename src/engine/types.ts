/**
 * Firmware and acceleration available on the host, inspected once per run
 * and applied identically to every virtual machine of the run.
 */
export type HostCapabilities = {
  /** Host booted through UEFI (/sys/firmware/efi exists) */
  uefi: boolean;
  /** KVM device present (/dev/kvm) */
  acceleration: boolean;
}

/**
 * Guest networking of a virtual machine.
 */
export type Networking =
  | {mode: 'none'}
  | {mode: 'forwarded-port'; hostPort: number; guestPort: number}

/**
 * Request to run a virtual machine with passthrough access to host disks.
 */
export type VirtualMachineRequest = {
  /** Name used in logs and process tracking */
  name: string;
  /** Host block devices attached as raw virtio disks, in order */
  disks: string[];
  /** Installer image to boot from; omitted to boot from the first disk */
  cdrom?: string;
  networking: Networking;
  capabilities: HostCapabilities;
  /** Virtual CPU count */
  cpus: number;
  /** Memory in MiB */
  memoryMb: number;
  /** Exit instead of rebooting when the guest reboots */
  noReboot?: boolean;
  /** File receiving the machine's stdout/stderr */
  logPath: string;
}

/**
 * Result of a virtual machine run to completion.
 */
export type VirtualMachineResult = {
  /** Exit code (0 = success), undefined when killed by a signal */
  exitCode?: number;
  startedAt: Date;
  finishedAt: Date;
  /** Tail of the machine's output */
  log: string;
  /** Error message if the process could not be run */
  error?: string;
}

/**
 * A running detached virtual machine.
 *
 * The handle is owned by the executor that started it; other components only
 * receive the forwarded endpoint.
 */
export type VirtualSession = {
  readonly name: string;
  readonly pid: number;
  /** Forwarded host port, when the machine has one */
  readonly hostPort?: number;
  readonly guestPort?: number;
  readonly logPath: string;
  readonly uefi: boolean;
  /** True once the process has exited or been disposed */
  readonly disposed: boolean;
  /** Tail of the machine's output so far */
  readonly log: string;
  /**
   * Waits for the process to exit, without bound.
   * @returns Exit code, undefined when killed by a signal
   */
  waitForExit(): Promise<number | undefined>;
  /**
   * Terminates the process if still running and invalidates the handle.
   * Safe to call more than once.
   */
  dispose(): Promise<void>;
}

/**
 * Address of a forwarded service, handed to components that must not own the session.
 */
export type ServiceEndpoint = {
  host: string;
  port: number;
}
