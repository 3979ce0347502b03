/**
 * Names shared with the runtime that loads the produced jar.
 * They cannot be changed here without changing the runtime accordingly.
 */
export type Layout = {
  /** Topology description, always required at the root of the topology directory */
  readonly jobFile: string;
  /** Optional Python requirements manifest */
  readonly manifestFile: string;
  /** Directory created by virtualenv inside the resources directory */
  readonly envName: string;
  /** Directory of the jar where the topology content lives */
  readonly resourcesDir: string;
  readonly defaultBaseArchive: string;
  readonly archiveExtension: string;
  readonly envTool: string;
  readonly installerTool: string;
  readonly programName: string;
}

export const LAYOUT: Layout = Object.freeze({
  jobFile: 'topology.yaml',
  manifestFile: 'requirements.txt',
  envName: 'topology_venv',
  resourcesDir: 'resources',
  defaultBaseArchive: 'minimal.jar',
  archiveExtension: 'jar',
  envTool: 'virtualenv',
  installerTool: 'pip',
  programName: 'topojar'
})
