/**
 * Documentation Project Interface
 *
 * The core orchestrates a project's lifecycle but never renders content
 * itself. Implementations wrap a documentation tool; every operation
 * rejects with an error when the tool fails.
 */

export interface ProjectMetadata {
  author: string;
  title?: string;
  version?: string;
}

export interface DocsProject {
  /** Directory whose packages are documented */
  readonly sourceRoot: string;

  /** Directory holding the project scaffolding and its output */
  readonly outputRoot: string;

  /** Project configuration file with the `version` and `release` lines */
  readonly configFile: string;

  // ==========================================================================
  // State checks
  // ==========================================================================

  /**
   * Check whether the project scaffolding exists on disk.
   */
  exists(): Promise<boolean>;

  /**
   * Check whether description files have been generated.
   */
  hasGeneratedFiles(): Promise<boolean>;

  /**
   * Check whether built artifacts exist.
   */
  hasBuildOutput(): Promise<boolean>;

  /**
   * Absolute paths of the generated description files.
   */
  sourceFiles(): Promise<string[]>;

  // ==========================================================================
  // Transitions
  // ==========================================================================

  create(metadata: ProjectMetadata): Promise<void>;

  generateFiles(): Promise<void>;

  build(): Promise<void>;
}

/**
 * Builds a project handle for a source/output root pair.
 */
export type DocsProjectFactory = (roots: { sourceRoot: string; outputRoot: string }) => DocsProject;
