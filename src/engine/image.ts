import {createWriteStream} from 'node:fs'
import {mkdir, writeFile} from 'node:fs/promises'
import {dirname} from 'node:path'
import {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'
import type {ReadableStream} from 'node:stream/web'
import {
  ImageDownloadFailedError,
  ImagePreparationFailedError,
  PackagePreparationFailedError
} from '../errors.js'
import {execaToolRunner, toolLog, type ToolRunner} from './tool.js'
import type {Workspace} from './workspace.js'

export type Fetch = (url: string) => Promise<Response>

export type ImagePreparerOptions = {
  runTool?: ToolRunner;
  fetch?: Fetch;
  /** Apt source enabling the no-subscription repository */
  aptSourcePath?: string;
  aptSource?: string;
  /** Where the repository signing key is stored */
  keyringPath?: string;
  keyringUrl?: string;
  /** Packages the host needs to build the image and run the installer */
  packages?: string[];
}

export const defaultPackages = ['proxmox-auto-install-assistant', 'xorriso', 'ovmf']

/**
 * Prepares the host and the installer image.
 *
 * All three operations are idempotent: re-running them overwrites what a
 * previous run left behind.
 */
export class ImagePreparer {
  private readonly runTool: ToolRunner
  private readonly fetch: Fetch
  private readonly aptSourcePath: string
  private readonly aptSource: string
  private readonly keyringPath: string
  private readonly keyringUrl: string
  private readonly packages: string[]

  constructor(options: ImagePreparerOptions = {}) {
    this.runTool = options.runTool ?? execaToolRunner
    this.fetch = options.fetch ?? (async url => fetch(url))
    this.aptSourcePath = options.aptSourcePath ?? '/etc/apt/sources.list.d/pve.list'
    this.aptSource = options.aptSource ?? 'deb http://download.proxmox.com/debian/pve bookworm pve-no-subscription'
    this.keyringPath = options.keyringPath ?? '/etc/apt/trusted.gpg.d/proxmox-release-bookworm.gpg'
    this.keyringUrl = options.keyringUrl ?? 'https://enterprise.proxmox.com/debian/proxmox-release-bookworm.gpg'
    this.packages = options.packages ?? defaultPackages
  }

  /**
   * Adds the package repository and installs the host tools.
   * @throws PackagePreparationFailedError
   */
  async preparePackages(): Promise<void> {
    try {
      await mkdir(dirname(this.aptSourcePath), {recursive: true})
      await writeFile(this.aptSourcePath, `${this.aptSource}\n`, 'utf8')
    } catch (error) {
      throw new PackagePreparationFailedError(`Cannot write ${this.aptSourcePath}`, undefined, {cause: error})
    }

    try {
      await this.download(this.keyringUrl, this.keyringPath)
    } catch (error) {
      throw new PackagePreparationFailedError(`Cannot fetch repository key from ${this.keyringUrl}`, undefined, {cause: error})
    }

    const commands: Array<[string, string[]]> = [
      ['apt-get', ['clean']],
      ['apt-get', ['update']],
      ['apt-get', ['install', '-yq', ...this.packages]]
    ]
    for (const [file, args] of commands) {
      const result = await this.runTool(file, args)
      if (result.failed) {
        throw new PackagePreparationFailedError(`${result.command} failed with exit code ${result.exitCode ?? 'none'}`, toolLog(result))
      }
    }
  }

  /**
   * Downloads the base installer image into the workspace.
   * The file is staged and only moved into place once complete.
   * @param reuse - Keep an image left by a previous run
   * @returns Path of the image
   * @throws ImageDownloadFailedError
   */
  async downloadImage(url: string, workspace: Workspace, options?: {reuse?: boolean}): Promise<string> {
    if (options?.reuse && await workspace.exists('pve.iso')) {
      return workspace.path('pve.iso')
    }

    await workspace.remove('pve.iso')
    try {
      await this.download(url, workspace.stagingPath('pve.iso'))
    } catch (error) {
      await workspace.discard('pve.iso')
      const reason = error instanceof Error ? error.message : String(error)
      throw new ImageDownloadFailedError(url, reason, {cause: error})
    }

    return workspace.commit('pve.iso')
  }

  /**
   * Bakes the answer file into the base image.
   * @returns Path of the derived image
   * @throws ImagePreparationFailedError when the tool fails or produces no image
   */
  async prepareAutoinstallImage(workspace: Workspace): Promise<string> {
    await workspace.remove('pve-autoinstall.iso')
    const result = await this.runTool('proxmox-auto-install-assistant', [
      'prepare-iso',
      workspace.path('pve.iso'),
      '--fetch-from',
      'iso',
      '--answer-file',
      workspace.path('answer.toml'),
      '--output',
      workspace.path('pve-autoinstall.iso')
    ])

    if (result.failed) {
      throw new ImagePreparationFailedError(`prepare-iso failed with exit code ${result.exitCode ?? 'none'}`, toolLog(result))
    }

    if (!await workspace.exists('pve-autoinstall.iso')) {
      throw new ImagePreparationFailedError('prepare-iso exited successfully but produced no image', toolLog(result))
    }

    return workspace.path('pve-autoinstall.iso')
  }

  private async download(url: string, destination: string): Promise<void> {
    const response = await this.fetch(url)
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`)
    }

    if (!response.body) {
      throw new Error('Empty response body')
    }

    const body: ReadableStream<Uint8Array> = response.body
    await pipeline(Readable.fromWeb(body), createWriteStream(destination))
  }
}
