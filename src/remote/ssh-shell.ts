import {Client, type ConnectConfig} from 'ssh2'
import type {ServiceEndpoint} from '../engine/types.js'

export type CommandResult = {
  stdout: string;
  stderr: string;
  /** Exit code, null when the remote process died without one */
  code: number | null;
}

/**
 * Command and file transfer channel to a remote system.
 */
export type RemoteShell = {
  exec(command: string): Promise<CommandResult>;
  upload(localPath: string, remotePath: string): Promise<void>;
  close(): Promise<void>;
}

export type RemoteCredential = {
  username: string;
  password: string;
}

/**
 * Opens a shell on a remote system.
 */
export type ShellFactory = (endpoint: ServiceEndpoint, credential: RemoteCredential) => Promise<RemoteShell>

/**
 * SSH shell over a single ssh2 connection.
 *
 * The target is a freshly installed system reached through a forwarded port,
 * so its host key is accepted without verification.
 */
export class SshShell implements RemoteShell {
  /**
   * Connects and authenticates.
   * @param readyTimeoutMs - Bound on the handshake
   */
  static async connect(endpoint: ServiceEndpoint, credential: RemoteCredential, readyTimeoutMs = 20_000): Promise<SshShell> {
    const config: ConnectConfig = {
      host: endpoint.host,
      port: endpoint.port,
      username: credential.username,
      password: credential.password,
      readyTimeout: readyTimeoutMs,
      hostVerifier: () => true
    }

    const conn = new Client()
    await new Promise<void>((resolve, reject) => {
      conn.once('ready', () => {
        conn.removeListener('error', reject)
        resolve()
      })
      conn.once('error', reject)
      conn.connect(config)
    })

    return new SshShell(conn)
  }

  private closed = false

  private constructor(private readonly conn: Client) {
    // Late transport errors surface through the pending exec/upload callbacks
    conn.on('error', () => {
      this.closed = true
    })
  }

  async exec(command: string): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      this.conn.exec(command, (error, stream) => {
        if (error) {
          reject(error)
          return
        }

        let stdout = ''
        let stderr = ''
        stream.on('data', (data: Buffer) => {
          stdout += data.toString()
        })
        stream.stderr.on('data', (data: Buffer) => {
          stderr += data.toString()
        })
        stream.on('close', (code: number | null) => {
          resolve({stdout, stderr, code: code ?? null})
        })
      })
    })
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.conn.sftp((error, sftp) => {
        if (error) {
          reject(error)
          return
        }

        sftp.fastPut(localPath, remotePath, putError => {
          sftp.end()
          if (putError) {
            reject(putError)
            return
          }

          resolve()
        })
      })
    })
  }

  async close(): Promise<void> {
    if (this.closed) {
      return
    }

    this.closed = true
    this.conn.end()
  }
}

export const sshShellFactory: ShellFactory = async (endpoint, credential) => SshShell.connect(endpoint, credential)
