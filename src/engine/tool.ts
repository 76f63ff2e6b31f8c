import process from 'node:process'
import {execa} from 'execa'

/**
 * Outcome of an external tool invocation.
 * Never thrown: callers classify it as fatal or not.
 */
export type ToolResult = {
  /** Command line as executed, for diagnostics */
  command: string;
  /** Exit code, undefined when the process never started or died by signal */
  exitCode?: number;
  stdout: string;
  stderr: string;
  /** True when the process could not be spawned or exited non-zero */
  failed: boolean;
}

export type ToolOptions = {
  /** Data written to the tool's stdin */
  input?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Runs an external tool to completion and captures its output.
 */
export type ToolRunner = (file: string, args: string[], options?: ToolOptions) => Promise<ToolResult>

/**
 * Build a minimal environment for host tools.
 * PATH, HOME and locale settings are kept, plus a non-interactive apt frontend.
 */
function toolEnv(): Record<string, string> {
  const env: Record<string, string> = {DEBIAN_FRONTEND: 'noninteractive'}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key === 'LANG' || key.startsWith('LC_'))) {
      env[key] = value
    }
  }

  return env
}

export const execaToolRunner: ToolRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    env: {...toolEnv(), ...options?.env},
    extendEnv: false,
    input: options?.input,
    timeout: options?.timeoutMs,
    reject: false
  })

  return {
    command: result.command,
    exitCode: result.exitCode,
    stdout: String(result.stdout),
    stderr: String(result.stderr),
    failed: result.failed
  }
}

/**
 * Joins stdout and stderr of a result into a single diagnostic log.
 */
export function toolLog(result: ToolResult): string {
  return [result.stdout, result.stderr].filter(Boolean).join('\n')
}
