import {homedir} from 'node:os'
import {join} from 'node:path'
import {ConfigurationPushFailedError} from '../errors.js'
import {execaToolRunner, type ToolRunner} from '../engine/tool.js'
import type {ServiceEndpoint} from '../engine/types.js'
import {sshShellFactory, type RemoteCredential, type RemoteShell, type ShellFactory} from './ssh-shell.js'

/**
 * A local file and where it goes on the target.
 */
export type PushedFile = {
  name: string;
  localPath: string;
  destination: string;
}

/**
 * Outcome of a remote command. Failures are recorded, never thrown.
 */
export type CommandOutcome = {
  step: string;
  command: string;
  ok: boolean;
  code: number | null;
  output: string;
  /** Transport error message, when the command could not be run */
  error?: string;
}

export type ApplyResult = {
  /** Destinations written on the target, in push order */
  uploaded: string[];
  commands: CommandOutcome[];
}

export type RemoteConfiguratorOptions = {
  shellFactory?: ShellFactory;
  runTool?: ToolRunner;
  nameservers?: string[];
  knownHostsPath?: string;
}

export const defaultNameservers = ['185.12.64.1', '185.12.64.2', '1.1.1.1', '8.8.4.4']

export const disabledRepositories = [
  '/etc/apt/sources.list.d/pve-enterprise.list',
  '/etc/apt/sources.list.d/ceph.list'
]

/**
 * Quotes a value for a POSIX shell.
 */
export function shellQuote(value: string): string {
  return `'${value.replaceAll('\'', '\'\\\'\'')}'`
}

type RemoteStep = {
  step: string;
  command: string;
  /** A dropped connection counts as success (the command ends the session) */
  closesSession?: boolean;
}

/**
 * Pushes configuration files to a freshly installed system and finalizes it.
 *
 * Uploads are all-or-nothing: the first failed upload aborts with
 * ConfigurationPushFailedError before any command runs. Commands after the
 * uploads are best effort and reported through their outcomes.
 */
export class RemoteConfigurator {
  private readonly shellFactory: ShellFactory
  private readonly runTool: ToolRunner
  private readonly nameservers: string[]
  private readonly knownHostsPath: string

  constructor(options: RemoteConfiguratorOptions = {}) {
    this.shellFactory = options.shellFactory ?? sshShellFactory
    this.runTool = options.runTool ?? execaToolRunner
    this.nameservers = options.nameservers ?? defaultNameservers
    this.knownHostsPath = options.knownHostsPath ?? join(homedir(), '.ssh', 'known_hosts')
  }

  async apply(endpoint: ServiceEndpoint, credential: RemoteCredential, files: PushedFile[], host: {hostname: string}): Promise<ApplyResult> {
    // The installed system has a new host key; a stale entry would block later logins
    await this.runTool('ssh-keygen', ['-f', this.knownHostsPath, '-R', `[${endpoint.host}]:${endpoint.port}`])

    let shell: RemoteShell
    try {
      shell = await this.shellFactory(endpoint, credential)
    } catch (error) {
      throw new ConfigurationPushFailedError(`${endpoint.host}:${endpoint.port}`, {cause: error})
    }

    try {
      const uploaded: string[] = []
      for (const file of files) {
        try {
          await shell.upload(file.localPath, file.destination)
        } catch (error) {
          throw new ConfigurationPushFailedError(file.destination, {cause: error})
        }

        uploaded.push(file.destination)
      }

      const commands: CommandOutcome[] = []
      for (const step of this.steps(host.hostname)) {
        commands.push(await this.runStep(shell, step))
      }

      return {uploaded, commands}
    } finally {
      await shell.close()
    }
  }

  private steps(hostname: string): RemoteStep[] {
    const resolvConf = this.nameservers.map(address => shellQuote(`nameserver ${address}`)).join(' ')
    return [
      ...disabledRepositories.map(path => ({
        step: 'disable-repository',
        command: `sed -i 's/^\\([^#].*\\)/# \\1/g' ${path}`
      })),
      {step: 'nameservers', command: `printf '%s\\n' ${resolvConf} > /etc/resolv.conf`},
      {step: 'hostname', command: `echo ${shellQuote(hostname)} > /etc/hostname`},
      {step: 'disable-rpcbind', command: 'systemctl disable --now rpcbind rpcbind.socket'},
      {step: 'poweroff', command: 'poweroff', closesSession: true}
    ]
  }

  private async runStep(shell: RemoteShell, {step, command, closesSession}: RemoteStep): Promise<CommandOutcome> {
    try {
      const {stdout, stderr, code} = await shell.exec(command)
      const output = [stdout, stderr].filter(Boolean).join('\n')
      return {step, command, ok: code === 0 || (closesSession === true && code === null), code, output}
    } catch (error) {
      return {
        step,
        command,
        ok: closesSession === true,
        code: null,
        output: '',
        error: error instanceof Error ? error.message : String(error)
      }
    }
  }
}
