// ---------------------------------------------------------------------------
// Shared build and runtime domain types.
//
// Recipes are parsed into frozen Stage declarations; the executor turns them
// into Snapshots and the assembler folds them into an ImageDescriptor that the
// supervisor launches.
// ---------------------------------------------------------------------------

// -- Instructions ------------------------------------------------------------

/** Periodic liveness probe declared by an image. */
export type Healthcheck = {
  /** Probe command (exec form). Exit code 0 means healthy. */
  readonly command: readonly string[];
  readonly intervalMs: number;
  readonly timeoutMs: number;
  /** Grace period after launch during which failures do not count toward retries. */
  readonly startPeriodMs: number;
  /** Consecutive failures needed to mark a healthy process unhealthy. */
  readonly retries: number;
}

export type EnvInstruction = {
  readonly kind: 'env';
  readonly name: string;
  readonly value: string;
}

export type RunInstruction = {
  readonly kind: 'run';
  /** Exec-form command. Shell form is stored as `['/bin/sh', '-c', script]`. */
  readonly command: readonly string[];
}

export type CopyInstruction = {
  readonly kind: 'copy';
  /** Paths relative to the build context, or absolute paths inside the `from` stage. */
  readonly sources: readonly string[];
  /** Destination, resolved against the current workdir when relative. */
  readonly destination: string;
  /** Copy from another stage's filesystem instead of the build context. */
  readonly from?: string;
}

export type ExposeInstruction = {
  readonly kind: 'expose';
  readonly port: number;
}

export type HealthcheckInstruction = {
  readonly kind: 'healthcheck';
  /** `null` disables a healthcheck inherited from a base stage. */
  readonly healthcheck: Healthcheck | null;
}

export type EntrypointInstruction = {
  readonly kind: 'entrypoint';
  readonly command: readonly string[];
}

export type WorkdirInstruction = {
  readonly kind: 'workdir';
  readonly path: string;
}

export type Instruction =
  | EnvInstruction
  | RunInstruction
  | CopyInstruction
  | ExposeInstruction
  | HealthcheckInstruction
  | EntrypointInstruction
  | WorkdirInstruction

export type InstructionKind = Instruction['kind']

// -- Stages & recipes --------------------------------------------------------

export type Stage = {
  readonly name: string;
  /** Name of another stage, or an external base identity (e.g. `python:3.11-slim`). */
  readonly from: string;
  readonly instructions: readonly Instruction[];
}

export type Recipe = {
  readonly name: string;
  readonly stages: readonly Stage[];
  /** Directory the recipe was loaded from (default build context). */
  readonly root: string;
}

// -- Snapshots ---------------------------------------------------------------

/** Runtime metadata accumulated while applying instructions. */
export type SnapshotConfig = {
  readonly env: Readonly<Record<string, string>>;
  readonly workdir: string;
  /** Sorted, unique. */
  readonly exposedPorts: readonly number[];
  readonly entrypoint?: readonly string[];
  readonly healthcheck?: Healthcheck;
}

/**
 * Filesystem + metadata state after one build step.
 * Metadata-only steps share their parent's rootfs layer.
 */
export type Snapshot = {
  readonly fingerprint: string;
  readonly parent?: string;
  /** Fingerprint of the layer whose `rootfs/` directory holds the files. */
  readonly rootfs: string;
  readonly config: SnapshotConfig;
  /** Instruction that produced this snapshot; absent on root snapshots. */
  readonly instruction?: Instruction;
  /** External base identity, set on root snapshots only. */
  readonly base?: string;
}

/** One executed (or reused) build step. */
export type LayerRecord = {
  readonly stage: string;
  readonly index: number;
  readonly fingerprint: string;
  readonly cached: boolean;
  readonly instruction: Instruction;
}

// -- Images ------------------------------------------------------------------

export type ImageDescriptor = {
  readonly schemaVersion: 1;
  /** SHA-256 over the canonical JSON of every other field. */
  readonly digest: string;
  readonly name: string;
  readonly stage: string;
  readonly snapshot: string;
  readonly rootfs: string;
  /** Fingerprints from the external base to the final step. */
  readonly layers: readonly string[];
  readonly exposedPorts: readonly number[];
  readonly env: Readonly<Record<string, string>>;
  readonly workdir: string;
  readonly entrypoint: readonly string[];
  readonly healthcheck?: Healthcheck;
}

// -- Supervision -------------------------------------------------------------

export type HealthState = 'Starting' | 'Ready' | 'Healthy' | 'Unhealthy' | 'Terminated'

/** Runtime state of the managed entrypoint process. */
export type ProcessHandle =
  | {readonly state: 'Starting' | 'Ready' | 'Healthy' | 'Unhealthy'; readonly pid?: number}
  | {readonly state: 'Terminated'; readonly pid?: number; readonly exitCode: number | null; readonly signal?: string}

export type StateTransition = {
  readonly from: HealthState;
  readonly to: HealthState;
  /** Clock time of the transition, in milliseconds. */
  readonly at: number;
}

// -- Project configuration ---------------------------------------------------

export type StratumConfig = {
  /** Store root directory (layers, staging, images). */
  store?: string;
  /** External base identities mapped to host directories. */
  bases?: Record<string, string>;
}
