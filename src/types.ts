/**
 * Three-valued "use an isolated environment" flag.
 *
 * `unset` means the user expressed no preference: the layout validator
 * turns it into `enabled` or `disabled` depending on whether the topology
 * ships a requirements manifest.
 */
export type EnvMode = 'unset' | 'enabled' | 'disabled'

export type ResolvedEnvMode = Exclude<EnvMode, 'unset'>

export type RunOptions<M extends EnvMode = EnvMode> = {
  readonly useEnv: M;
  /** Create the environment with access to system-wide site packages */
  readonly systemPackages: boolean;
  /** Package index URL passed to pip */
  readonly indexUrl?: string;
  /** Absolute path of the verbose pip log */
  readonly installLog?: string;
  readonly verbose: boolean;
  /** Absolute path of the base jar */
  readonly baseArchive: string;
  /** Absolute path of the jar to produce */
  readonly outputArchive: string;
}

export type ResolvedRunOptions = RunOptions<ResolvedEnvMode>

/**
 * Absolute paths of the well-known entries of a topology directory.
 */
export type ProjectLayout = {
  readonly projectDir: string;
  readonly jobFile: string;
  readonly manifestFile: string;
  readonly envDir: string;
}

export type InstallerOptions = {
  readonly systemPackages: boolean;
  readonly indexUrl?: string;
  readonly installLog?: string;
  readonly verbose: boolean;
}

export type PipelineState =
  | 'Start'
  | 'BaseOpened'
  | 'WorkspaceCreated'
  | 'Validated'
  | 'Staged'
  | 'DependenciesResolved'
  | 'Packed'
  | 'Done'
  | 'Aborted'

export type BuildResult = {
  outputArchive: string;
  /** Resolved value of the isolated environment flag */
  useEnv: boolean;
  /** Number of files written to the output jar */
  entries: number;
}
