import {access, mkdir, rename, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {StagingError, WorkspaceError} from '../errors.js'

/**
 * Names of the files a provisioning run produces.
 */
export type WorkspaceFile =
  | 'answer.toml'
  | 'pve.iso'
  | 'pve-autoinstall.iso'
  | 'qemu-install.log'
  | 'qemu-configure.log'

/**
 * Working directory of a provisioning run.
 *
 * Holds every file the run produces at a fixed, well-known location:
 * - **answer.toml**: unattended-install answer file
 * - **pve.iso**: downloaded base installer image
 * - **pve-autoinstall.iso**: installer image with the answer file baked in
 * - **qemu-install.log** / **qemu-configure.log**: virtual machine output
 * - **template_files/**: rendered configuration files pushed to the target
 *
 * ## Staging
 *
 * Files produced by external tools are written to `{name}.partial` first
 * and renamed into place once complete, so an interrupted download or image
 * build never leaves a file that looks finished.
 *
 * 1. `stagingPath()` returns `{name}.partial`
 * 2. Success: `commit()` atomically renames it to `{name}`
 *    OR Failure: `discard()` removes it
 */
export class Workspace {
  /**
   * Opens a workspace, creating the directory if needed.
   * @param root - Workspace directory
   */
  static async open(root: string): Promise<Workspace> {
    try {
      await mkdir(join(root, 'template_files'), {recursive: true})
    } catch (error) {
      throw new WorkspaceError('WORKSPACE_UNAVAILABLE', `Cannot create workspace at ${root}`, {cause: error})
    }

    return new Workspace(root)
  }

  private constructor(readonly root: string) {}

  path(file: WorkspaceFile): string {
    return join(this.root, file)
  }

  stagingPath(file: WorkspaceFile): string {
    return `${this.path(file)}.partial`
  }

  /**
   * Path of a rendered template file.
   * @param name - Template name (e.g. "hosts")
   */
  templatePath(name: string): string {
    if (!/^[\w.-]+$/.test(name) || name.includes('..')) {
      throw new WorkspaceError('INVALID_TEMPLATE_NAME', `Invalid template name: ${name}`)
    }

    return join(this.root, 'template_files', name)
  }

  /**
   * Writes a rendered template file.
   * @returns Path of the written file
   */
  async writeTemplate(name: string, content: string): Promise<string> {
    const path = this.templatePath(name)
    await writeFile(path, content, 'utf8')
    return path
  }

  async exists(file: WorkspaceFile): Promise<boolean> {
    try {
      await access(this.path(file))
      return true
    } catch {
      return false
    }
  }

  async write(file: WorkspaceFile, content: string): Promise<string> {
    const path = this.path(file)
    await writeFile(path, content, 'utf8')
    return path
  }

  async commit(file: WorkspaceFile): Promise<string> {
    try {
      await rename(this.stagingPath(file), this.path(file))
      return this.path(file)
    } catch (error) {
      throw new StagingError(`Failed to commit ${file}`, {cause: error})
    }
  }

  async discard(file: WorkspaceFile): Promise<void> {
    await rm(this.stagingPath(file), {force: true})
  }

  /**
   * Removes a file and its staging copy so the next phase regenerates it.
   */
  async remove(file: WorkspaceFile): Promise<void> {
    await rm(this.path(file), {force: true})
    await this.discard(file)
  }
}
