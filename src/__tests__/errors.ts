import test from 'ava'
import {
  ProvisionError,
  InputError,
  NoDisksFoundError,
  InvalidManualSelectionError,
  EmptyCredentialError,
  ConfigError,
  TemplateError,
  MissingSubstitutionError,
  UndeclaredTokenError,
  PreparationError,
  ImageDownloadFailedError,
  ImagePreparationFailedError,
  VirtualMachineError,
  InstallationFailedError,
  ServiceUnreachableError,
  VirtualMachineCleanupError,
  RemoteError,
  ConfigurationPushFailedError,
  PipelineError,
  PhasePreconditionError
} from '../errors.js'

// -- instanceof chains -------------------------------------------------------

test('NoDisksFoundError is instanceof InputError and ProvisionError', t => {
  const error = new NoDisksFoundError()
  t.true(error instanceof NoDisksFoundError)
  t.true(error instanceof InputError)
  t.true(error instanceof ProvisionError)
  t.true(error instanceof Error)
})

test('MissingSubstitutionError is instanceof TemplateError and ProvisionError', t => {
  const error = new MissingSubstitutionError('hosts', ['FQDN'])
  t.true(error instanceof TemplateError)
  t.true(error instanceof ProvisionError)
})

test('ImagePreparationFailedError is instanceof PreparationError and ProvisionError', t => {
  const error = new ImagePreparationFailedError('prepare-iso failed')
  t.true(error instanceof PreparationError)
  t.true(error instanceof ProvisionError)
})

test('InstallationFailedError is instanceof VirtualMachineError and ProvisionError', t => {
  const error = new InstallationFailedError(1, 'log')
  t.true(error instanceof VirtualMachineError)
  t.true(error instanceof ProvisionError)
})

test('ConfigurationPushFailedError is instanceof RemoteError and ProvisionError', t => {
  const error = new ConfigurationPushFailedError('/etc/hosts')
  t.true(error instanceof RemoteError)
  t.true(error instanceof ProvisionError)
})

test('PhasePreconditionError is instanceof PipelineError and ProvisionError', t => {
  const error = new PhasePreconditionError('install', 'imagePath')
  t.true(error instanceof PipelineError)
  t.true(error instanceof ProvisionError)
})

// -- codes and messages ------------------------------------------------------

test('error codes are stable', t => {
  t.is(new NoDisksFoundError().code, 'NO_DISKS_FOUND')
  t.is(new InvalidManualSelectionError('bad').code, 'INVALID_MANUAL_SELECTION')
  t.is(new EmptyCredentialError().code, 'EMPTY_CREDENTIAL')
  t.is(new ConfigError('bad').code, 'CONFIG_ERROR')
  t.is(new UndeclaredTokenError('hosts', ['X']).code, 'UNDECLARED_TOKEN')
  t.is(new ImageDownloadFailedError('https://example.com/a.iso', 'HTTP 404').code, 'IMAGE_DOWNLOAD_FAILED')
  t.is(new ServiceUnreachableError(5555, 60, 5000).code, 'SERVICE_UNREACHABLE')
  t.is(new VirtualMachineCleanupError('vm').code, 'VM_CLEANUP_FAILED')
})

test('name matches the class', t => {
  t.is(new ConfigurationPushFailedError('/etc/hosts').name, 'ConfigurationPushFailedError')
  t.is(new InstallationFailedError(2, '').name, 'InstallationFailedError')
})

test('MissingSubstitutionError lists the tokens', t => {
  const error = new MissingSubstitutionError('interfaces', ['MAC_ADDRESS', 'IPV6_CIDR'])
  t.is(error.message, 'Template interfaces: no value for {{MAC_ADDRESS}}, {{IPV6_CIDR}}')
  t.is(error.template, 'interfaces')
  t.deepEqual(error.tokens, ['MAC_ADDRESS', 'IPV6_CIDR'])
})

test('ServiceUnreachableError reports the total wait', t => {
  const error = new ServiceUnreachableError(5555, 60, 5000)
  t.is(error.message, 'Port 5555 not reachable after 60 attempts (300s)')
})

test('ServiceUnreachableError carries the machine output', t => {
  t.is(new ServiceUnreachableError(5555, 3, 5000, 'no bootable device').log, 'no bootable device')
  t.is(new ServiceUnreachableError(5555, 3, 5000).log, undefined)
})

test('InstallationFailedError carries exit code and log', t => {
  const error = new InstallationFailedError(3, 'kernel panic')
  t.is(error.exitCode, 3)
  t.is(error.log, 'kernel panic')
  t.is(error.message, 'Installer virtual machine exited with code 3')
})

test('ConfigurationPushFailedError appends the cause message', t => {
  const error = new ConfigurationPushFailedError('/etc/hosts', {cause: new Error('Permission denied')})
  t.is(error.message, 'Failed to push /etc/hosts: Permission denied')
  t.is(error.destination, '/etc/hosts')
})

test('cause is preserved', t => {
  const cause = new Error('root cause')
  const error = new ImagePreparationFailedError('failed', 'log', {cause})
  t.is(error.cause, cause)
  t.is(error.log, 'log')
})
