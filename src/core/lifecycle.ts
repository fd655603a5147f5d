/**
 * Project Lifecycle Engine
 *
 * Drives a documentable unit through absent → created → generated → built.
 * State is read from disk at the start of every call; nothing is carried
 * between calls. Tool failures become error results, never exceptions, and
 * no rollback is attempted: whatever the tool left on disk stays.
 */

import * as fs from "fs/promises";
import type { DocsProject, DocsProjectFactory } from "../adapters/docs/types.js";
import { ResolvedConfig, unitPaths } from "./config.js";
import type { Category, LifecycleAction, ProjectState } from "./schemas.js";
import { CommandResult, error, skipped, success } from "./types.js";
import { errorMessage } from "./utils.js";

// ============================================================================
// Types
// ============================================================================

export interface DocumentableUnit {
  category: Category;
  packageName: string;
  /** How messages name the unit, e.g. `plugin "foo"` */
  label: string;
  sourceRoot: string;
  outputRoot: string;
}

export interface TransitionData {
  unit: DocumentableUnit;
  before: ProjectState;
  after: ProjectState;
}

export interface LifecycleEngineOptions {
  config: ResolvedConfig;
  version: string;
  projects: DocsProjectFactory;
}

// ============================================================================
// Engine
// ============================================================================

export class LifecycleEngine {
  private readonly config: ResolvedConfig;
  private readonly version: string;
  private readonly projects: DocsProjectFactory;

  constructor(options: LifecycleEngineOptions) {
    this.config = options.config;
    this.version = options.version;
    this.projects = options.projects;
  }

  /**
   * Reconstruct a unit from its category and package name.
   */
  unit(category: Category, packageName: string): DocumentableUnit {
    const label =
      category === "core"
        ? this.config.core.title
        : category === "custom-package"
          ? `custom package "${packageName}"`
          : `plugin "${packageName}"`;

    return { category, packageName, label, ...unitPaths(this.config, category, packageName) };
  }

  async observe(unit: DocumentableUnit): Promise<ProjectState> {
    return observeState(this.project(unit));
  }

  run(action: LifecycleAction, unit: DocumentableUnit): Promise<CommandResult<TransitionData>> {
    switch (action) {
      case "create":
        return this.create(unit);
      case "generate":
        return this.generate(unit);
      case "build":
        return this.build(unit);
    }
  }

  async create(unit: DocumentableUnit): Promise<CommandResult<TransitionData>> {
    const project = this.project(unit);
    const before = await observeState(project);

    if (before !== "absent") {
      return skipped(
        { unit, before, after: before },
        `Documentation project already exists for ${unit.label}.`
      );
    }

    try {
      if (unit.category === "core") {
        await project.create({
          author: this.config.core.author,
          title: this.config.core.title,
          version: this.version,
        });
      } else {
        await project.create({ author: "Unknown" });
      }
    } catch (err) {
      return error(
        `An error occurred while creating the documentation project for ${unit.label}.`,
        "BUILD_TOOL",
        errorMessage(err)
      );
    }

    return success(
      { unit, before, after: await observeState(project) },
      `Documentation project has been created for ${unit.label}.`
    );
  }

  async generate(unit: DocumentableUnit): Promise<CommandResult<TransitionData>> {
    const project = this.project(unit);
    const before = await observeState(project);

    if (before === "absent") {
      return skipped({ unit, before, after: before }, notFound(unit));
    }

    try {
      await project.generateFiles();
      if (unit.category === "core") {
        await this.stripSourceSubstring(project);
      }
    } catch (err) {
      return error(
        `An error occurred while generating project files for ${unit.label}.`,
        "BUILD_TOOL",
        errorMessage(err)
      );
    }

    return success(
      { unit, before, after: await observeState(project) },
      `Project files have been generated for ${unit.label}.`
    );
  }

  async build(unit: DocumentableUnit): Promise<CommandResult<TransitionData>> {
    const project = this.project(unit);
    const before = await observeState(project);

    if (before === "absent") {
      return skipped({ unit, before, after: before }, notFound(unit));
    }

    try {
      if (unit.category === "core") {
        await this.stampVersion(project);
      }
      await project.build();
    } catch (err) {
      return error(
        `An error occurred while building project files for ${unit.label}.`,
        "BUILD_TOOL",
        errorMessage(err)
      );
    }

    return success(
      { unit, before, after: await observeState(project) },
      `Project files have been built for ${unit.label}.`
    );
  }

  // --------------------------------------------------------------------------
  // Core tree post-processing
  // --------------------------------------------------------------------------

  /**
   * Generated module paths carry the core's own package name; drop it.
   */
  private async stripSourceSubstring(project: DocsProject): Promise<void> {
    for (const file of await project.sourceFiles()) {
      const content = await fs.readFile(file, "utf-8");
      await fs.writeFile(file, content.split(this.config.sourceSubstring).join(""), "utf-8");
    }
  }

  /**
   * Rewrite the `version` and `release` lines of the project configuration.
   */
  private async stampVersion(project: DocsProject): Promise<void> {
    const content = await fs.readFile(project.configFile, "utf-8");
    const stamped = stampVersionLines(content, this.version);
    await fs.writeFile(project.configFile, stamped, "utf-8");
  }

  private project(unit: DocumentableUnit): DocsProject {
    return this.projects({ sourceRoot: unit.sourceRoot, outputRoot: unit.outputRoot });
  }
}

// ============================================================================
// Helpers
// ============================================================================

export async function observeState(project: DocsProject): Promise<ProjectState> {
  if (!(await project.exists())) return "absent";
  if (await project.hasBuildOutput()) return "built";
  if (await project.hasGeneratedFiles()) return "generated";
  return "created";
}

/**
 * Replace every line starting with `version` or `release` by
 * `<key> = '<version>'`, keeping all other lines and line endings.
 */
export function stampVersionLines(content: string, version: string): string {
  return content
    .split("\n")
    .map((line) => {
      if (!line.startsWith("version") && !line.startsWith("release")) {
        return line;
      }
      const key = line.match(/^\w+/)?.[0] ?? line;
      const ending = line.endsWith("\r") ? "\r" : "";
      return `${key} = '${version}'${ending}`;
    })
    .join("\n");
}

function notFound(unit: DocumentableUnit): string {
  return `Documentation project does not exist for ${unit.label}.`;
}
