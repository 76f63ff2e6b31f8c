import {Socket} from 'node:net'
import {setTimeout} from 'node:timers/promises'
import {ServiceUnreachableError} from '../errors.js'
import type {ServiceEndpoint} from './types.js'

export type Sleep = (ms: number) => Promise<unknown>

export type PollOptions = {
  /** Maximum number of probes */
  attempts: number;
  /** Delay between two probes */
  intervalMs: number;
  /** Resolves true once the condition holds */
  probe: (attempt: number) => Promise<boolean>;
  sleep?: Sleep;
}

export const defaultReadinessAttempts = 60
export const defaultReadinessIntervalMs = 5000

/**
 * Probes a condition until it holds or attempts run out.
 * Sleeps only between attempts, never after the last one.
 * @returns Number of the attempt that succeeded (1-based), or undefined when exhausted
 */
export async function pollUntil({attempts, intervalMs, probe, sleep = setTimeout}: PollOptions): Promise<number | undefined> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (await probe(attempt)) {
      return attempt
    }

    if (attempt < attempts) {
      await sleep(intervalMs)
    }
  }

  return undefined
}

/**
 * Checks whether a TCP connection can be opened.
 */
export async function probePort(host: string, port: number, timeoutMs = 3000): Promise<boolean> {
  return new Promise(resolve => {
    const socket = new Socket()
    const done = (open: boolean) => {
      socket.destroy()
      resolve(open)
    }

    socket.setTimeout(timeoutMs)
    socket.once('connect', () => {
      done(true)
    })
    socket.once('timeout', () => {
      done(false)
    })
    socket.once('error', () => {
      done(false)
    })
    socket.connect(port, host)
  })
}

export type WaitForServiceOptions = {
  attempts?: number;
  intervalMs?: number;
  probe?: (endpoint: ServiceEndpoint) => Promise<boolean>;
  sleep?: Sleep;
  onAttempt?: (attempt: number, attempts: number) => void;
}

/**
 * Waits until a forwarded service accepts connections.
 * @throws ServiceUnreachableError when the service never answers
 */
export async function waitForService(endpoint: ServiceEndpoint, options: WaitForServiceOptions = {}): Promise<number> {
  const attempts = options.attempts ?? defaultReadinessAttempts
  const intervalMs = options.intervalMs ?? defaultReadinessIntervalMs
  const probe = options.probe ?? (async ({host, port}: ServiceEndpoint) => probePort(host, port))

  const succeeded = await pollUntil({
    attempts,
    intervalMs,
    sleep: options.sleep,
    async probe(attempt) {
      options.onAttempt?.(attempt, attempts)
      return probe(endpoint)
    }
  })

  if (succeeded === undefined) {
    throw new ServiceUnreachableError(endpoint.port, attempts, intervalMs)
  }

  return succeeded
}
