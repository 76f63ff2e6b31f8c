export {Workspace, type WorkspaceFile} from './workspace.js'
export {VirtualMachineExecutor, type LogLine, type OnLogLine} from './executor.js'
export {QemuExecutor, buildQemuArgs, type QemuExecutorOptions} from './qemu-executor.js'
export {ImagePreparer, type ImagePreparerOptions} from './image.js'
export {pollUntil, probePort, waitForService, type PollOptions, type WaitForServiceOptions} from './readiness.js'
export {execaToolRunner, type ToolResult, type ToolRunner} from './tool.js'
export type {HostCapabilities, Networking, ServiceEndpoint, VirtualMachineRequest, VirtualMachineResult, VirtualSession} from './types.js'
