export {LayerStore, type StagedLayer} from './layer-store.js'
export {BuildContext, type ContextFile, type ResolvedSource} from './build-context.js'
export {BaseResolver, DirectoryBaseResolver, ScratchBaseResolver, isImageReference} from './base-resolver.js'
export {CommandRunner, type LogLine, type OnLogLine, type RunCommandRequest, type RunCommandResult} from './command-runner.js'
export {HostCommandRunner, childEnv} from './shell-runner.js'
export {ProcessLauncher, ExecaProcessLauncher, type LaunchRequest, type ManagedProcess, type ProcessExit} from './process-launcher.js'
export {CommandProbe, type HealthProbe, type ProbeResult} from './health-probe.js'
export {exportImage} from './image-export.js'
