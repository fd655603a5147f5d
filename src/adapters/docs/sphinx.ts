/**
 * Sphinx Documentation Project
 *
 * Implements DocsProject by running the Sphinx command line tools.
 * Layout under the output root:
 * ```
 * <outputRoot>/
 * ├── source/
 * │   ├── conf.py
 * │   ├── index.rst
 * │   └── <package>.<module>.rst   (sphinx-apidoc)
 * └── build/
 *     └── html/
 *         └── index.html           (sphinx-build)
 * ```
 */

import { execFile } from "child_process";
import { promisify } from "util";
import * as fs from "fs/promises";
import * as path from "path";
import { DocsProject, DocsProjectFactory, ProjectMetadata } from "./types.js";
import { CoreError, errorMessage } from "../../core/utils.js";

const execFileAsync = promisify(execFile);

/**
 * Runs an external tool, rejecting when it exits with a non-zero code.
 */
export type ToolRunner = (file: string, args: string[], cwd: string) => Promise<void>;

export const runTool: ToolRunner = async (file, args, cwd) => {
  try {
    await execFileAsync(file, args, { cwd, encoding: "utf-8" });
  } catch (error) {
    const stderr =
      typeof error === "object" && error !== null && "stderr" in error && typeof error.stderr === "string"
        ? error.stderr.trim()
        : "";
    const reason = stderr || errorMessage(error);
    throw new CoreError(`${file} failed: ${reason}`, "BUILD_TOOL", { file, args });
  }
};

export interface SphinxProjectOptions {
  sourceRoot: string;
  outputRoot: string;
  runner?: ToolRunner;
}

export class SphinxProject implements DocsProject {
  readonly sourceRoot: string;
  readonly outputRoot: string;
  readonly configFile: string;
  private readonly sourceDir: string;
  private readonly buildDir: string;
  private readonly runner: ToolRunner;

  constructor(options: SphinxProjectOptions) {
    this.sourceRoot = options.sourceRoot;
    this.outputRoot = options.outputRoot;
    this.sourceDir = path.join(this.outputRoot, "source");
    this.buildDir = path.join(this.outputRoot, "build", "html");
    this.configFile = path.join(this.sourceDir, "conf.py");
    this.runner = options.runner ?? runTool;
  }

  // ==========================================================================
  // State checks
  // ==========================================================================

  async exists(): Promise<boolean> {
    return pathExists(this.configFile);
  }

  async hasGeneratedFiles(): Promise<boolean> {
    const files = await this.sourceFiles();
    return files.some((file) => path.basename(file) !== "index.rst");
  }

  async hasBuildOutput(): Promise<boolean> {
    return pathExists(path.join(this.buildDir, "index.html"));
  }

  async sourceFiles(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.sourceDir);
      return entries
        .filter((name) => name.endsWith(".rst"))
        .sort()
        .map((name) => path.join(this.sourceDir, name));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  async create(metadata: ProjectMetadata): Promise<void> {
    await fs.mkdir(this.outputRoot, { recursive: true });

    const title = metadata.title ?? path.basename(this.sourceRoot);
    const args = ["-q", "--sep", "--ext-autodoc", "-p", title, "-a", metadata.author];
    if (metadata.version) {
      args.push("-v", metadata.version, "-r", metadata.version);
    }
    args.push(this.outputRoot);

    await this.runner("sphinx-quickstart", args, this.outputRoot);
  }

  async generateFiles(): Promise<void> {
    await this.runner(
      "sphinx-apidoc",
      ["--force", "-o", this.sourceDir, this.sourceRoot],
      this.outputRoot
    );
  }

  async build(): Promise<void> {
    await this.runner("sphinx-build", ["-b", "html", this.sourceDir, this.buildDir], this.outputRoot);
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a Sphinx-backed project factory.
 */
export function createSphinxFactory(runner?: ToolRunner): DocsProjectFactory {
  return ({ sourceRoot, outputRoot }) => new SphinxProject({ sourceRoot, outputRoot, runner });
}
