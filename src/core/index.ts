export {ImageBuilder, type BuildOptions, type BuildResult} from './image-builder.js'
export {StageExecutor, type StageExecutionOptions, type StageResult} from './stage-executor.js'
export {assembleImage, imageDigest, type AssembleOptions} from './assembler.js'
export {planStages, ancestry, requiredStages, defaultTarget, type BuildPlan, type PlannedStage, type ResolvedBase, type PlanOptions} from './planner.js'
export {RecipeLoader, resolveRecipeFile, recipeFilenames} from './recipe-loader.js'
export {parseDockerfile} from './dockerfile.js'
export {createHealthcheck, defaultHealthcheck, describeInstruction, parsePort, shellCommand, type HealthcheckOptions} from './instructions.js'
export {applyInstruction, rootConfig} from './snapshot-config.js'
export {canonicalJson, sha256, baseFingerprint, stepFingerprint, filesDigest} from './fingerprint.js'
export {FingerprintLock} from './fingerprint-lock.js'
export {
  Supervisor,
  ignoreUnhealthy,
  stopWhenUnhealthy,
  type SupervisorOptions,
  type RemediationPolicy,
  type RemediationAction,
  type UnhealthyEvent
} from './supervisor.js'
export {systemClock, type Clock} from './clock.js'
export {ConsoleReporter, stepLabel, type Reporter, type StepRef, type StratumEvent, type BuildEvent, type SupervisorEvent} from './reporter.js'
export {loadEnvFile} from './env-file.js'
export {dirSize, formatSize, formatDuration, parseDuration, slugify, resolveWithin} from './utils.js'
