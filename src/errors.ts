export class ProvisionError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ProvisionError'
  }
}

// -- Input errors ------------------------------------------------------------

export class InputError extends ProvisionError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'InputError'
  }
}

export class NoDisksFoundError extends InputError {
  constructor(options?: {cause?: unknown}) {
    super('NO_DISKS_FOUND', 'No suitable disks found', options)
    this.name = 'NoDisksFoundError'
  }
}

export class InvalidManualSelectionError extends InputError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_MANUAL_SELECTION', message, options)
    this.name = 'InvalidManualSelectionError'
  }
}

export class EmptyCredentialError extends InputError {
  constructor(options?: {cause?: unknown}) {
    super('EMPTY_CREDENTIAL', 'Root password must not be empty', options)
    this.name = 'EmptyCredentialError'
  }
}

export class ConfigError extends InputError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONFIG_ERROR', message, options)
    this.name = 'ConfigError'
  }
}

// -- Workspace errors --------------------------------------------------------

export class WorkspaceError extends ProvisionError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'WorkspaceError'
  }
}

export class StagingError extends WorkspaceError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

// -- Template errors ---------------------------------------------------------

export class TemplateError extends ProvisionError {
  constructor(
    code: string,
    readonly template: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(code, message, options)
    this.name = 'TemplateError'
  }
}

export class MissingSubstitutionError extends TemplateError {
  constructor(template: string, readonly tokens: string[], options?: {cause?: unknown}) {
    super('MISSING_SUBSTITUTION', template, `Template ${template}: no value for ${tokens.map(t => `{{${t}}}`).join(', ')}`, options)
    this.name = 'MissingSubstitutionError'
  }
}

export class UndeclaredTokenError extends TemplateError {
  constructor(template: string, readonly tokens: string[], options?: {cause?: unknown}) {
    super('UNDECLARED_TOKEN', template, `Template ${template}: undeclared token ${tokens.map(t => `{{${t}}}`).join(', ')}`, options)
    this.name = 'UndeclaredTokenError'
  }
}

export class TemplateNotFoundError extends TemplateError {
  constructor(template: string, path: string, options?: {cause?: unknown}) {
    super('TEMPLATE_NOT_FOUND', template, `Template ${template} not found at ${path}`, options)
    this.name = 'TemplateNotFoundError'
  }
}

// -- Preparation errors ------------------------------------------------------

export class PreparationError extends ProvisionError {
  constructor(
    code: string,
    message: string,
    readonly log?: string,
    options?: {cause?: unknown}
  ) {
    super(code, message, options)
    this.name = 'PreparationError'
  }
}

export class PackagePreparationFailedError extends PreparationError {
  constructor(message: string, log?: string, options?: {cause?: unknown}) {
    super('PACKAGE_PREPARATION_FAILED', message, log, options)
    this.name = 'PackagePreparationFailedError'
  }
}

export class ImageDownloadFailedError extends PreparationError {
  constructor(readonly url: string, reason: string, options?: {cause?: unknown}) {
    super('IMAGE_DOWNLOAD_FAILED', `Failed to download ${url}: ${reason}`, undefined, options)
    this.name = 'ImageDownloadFailedError'
  }
}

export class ImagePreparationFailedError extends PreparationError {
  constructor(message: string, log?: string, options?: {cause?: unknown}) {
    super('IMAGE_PREPARATION_FAILED', message, log, options)
    this.name = 'ImagePreparationFailedError'
  }
}

// -- Virtual machine errors --------------------------------------------------

export class VirtualMachineError extends ProvisionError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'VirtualMachineError'
  }
}

export class VirtualizationNotAvailableError extends VirtualMachineError {
  constructor(binary: string, options?: {cause?: unknown}) {
    super('VIRTUALIZATION_NOT_AVAILABLE', `${binary} not found. Please install QEMU.`, options)
    this.name = 'VirtualizationNotAvailableError'
  }
}

export class VirtualMachineStartError extends VirtualMachineError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VM_START_FAILED', message, options)
    this.name = 'VirtualMachineStartError'
  }
}

export class InstallationFailedError extends VirtualMachineError {
  constructor(
    readonly exitCode: number,
    readonly log: string,
    options?: {cause?: unknown}
  ) {
    super('INSTALLATION_FAILED', `Installer virtual machine exited with code ${exitCode}`, options)
    this.name = 'InstallationFailedError'
  }
}

export class ServiceUnreachableError extends VirtualMachineError {
  constructor(
    readonly port: number,
    readonly attempts: number,
    readonly intervalMs: number,
    /** Output of the machine that never answered */
    readonly log?: string,
    options?: {cause?: unknown}
  ) {
    super('SERVICE_UNREACHABLE', `Port ${port} not reachable after ${attempts} attempts (${attempts * intervalMs / 1000}s)`, options)
    this.name = 'ServiceUnreachableError'
  }
}

export class VirtualMachineCleanupError extends VirtualMachineError {
  constructor(name: string, options?: {cause?: unknown}) {
    super('VM_CLEANUP_FAILED', `Virtual machine ${name} did not terminate`, options)
    this.name = 'VirtualMachineCleanupError'
  }
}

// -- Remote configuration errors ---------------------------------------------

export class RemoteError extends ProvisionError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'RemoteError'
  }
}

export class ConfigurationPushFailedError extends RemoteError {
  constructor(readonly destination: string, options?: {cause?: unknown}) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super('CONFIGURATION_PUSH_FAILED', `Failed to push ${destination}${reason}`, options)
    this.name = 'ConfigurationPushFailedError'
  }
}

// -- Pipeline errors ---------------------------------------------------------

export class PipelineError extends ProvisionError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'PipelineError'
  }
}

export class PhasePreconditionError extends PipelineError {
  constructor(readonly phase: string, field: string, options?: {cause?: unknown}) {
    super('PHASE_PRECONDITION', `Phase ${phase}: ${field} has not been produced by an earlier phase`, options)
    this.name = 'PhasePreconditionError'
  }
}
