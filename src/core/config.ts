/**
 * Configuration
 *
 * Reads cmdcore.yaml from the root directory. Every field has a default,
 * so a missing file yields the default configuration.
 */

import * as fs from "fs/promises";
import * as path from "path";
import YAML from "yaml";
import { ConfigSchema, Config, Category } from "./schemas.js";
import { CoreError, errorMessage } from "./utils.js";

export const CONFIG_FILE = "cmdcore.yaml";

/**
 * Configuration with every path made absolute
 */
export interface ResolvedConfig extends Config {
  rootDir: string;
  /** Literal stripped from generated core description files */
  sourceSubstring: string;
}

/**
 * Source and output roots of a documentable unit
 */
export interface UnitPaths {
  sourceRoot: string;
  outputRoot: string;
}

export async function loadConfig(rootDir: string, configFile?: string): Promise<ResolvedConfig> {
  const fullPath = path.resolve(rootDir, configFile ?? CONFIG_FILE);

  let data: unknown = {};
  try {
    const content = await fs.readFile(fullPath, "utf-8");
    data = YAML.parse(content) ?? {};
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw new CoreError(`Unable to read ${fullPath}: ${errorMessage(error)}`, "CONFIG_INVALID");
    }
  }

  return resolveConfig(rootDir, data, fullPath);
}

/**
 * Validate raw configuration data and anchor its paths at `rootDir`.
 */
export function resolveConfig(rootDir: string, data: unknown, source = CONFIG_FILE): ResolvedConfig {
  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new CoreError(`Invalid configuration in ${source}: ${issues.join("; ")}`, "CONFIG_INVALID", {
      issues,
    });
  }

  const config = parsed.data;
  const root = path.resolve(rootDir);
  const paths = {
    packages: path.resolve(root, config.paths.packages),
    customPackages: path.resolve(root, config.paths.customPackages),
    plugins: path.resolve(root, config.paths.plugins),
    docs: path.resolve(root, config.paths.docs),
    data: path.resolve(root, config.paths.data),
    logs: path.resolve(root, config.paths.logs),
  };

  return {
    ...config,
    rootDir: root,
    paths,
    sourceSubstring: config.docs.sourceSubstring ?? `${config.core.name}.`,
  };
}

/**
 * Fixed path templates for each category
 */
export function unitPaths(config: ResolvedConfig, category: Category, packageName: string): UnitPaths {
  switch (category) {
    case "core":
      return {
        sourceRoot: config.paths.packages,
        outputRoot: path.join(config.paths.docs, config.core.name),
      };
    case "custom-package":
      return {
        sourceRoot: path.join(config.paths.customPackages, packageName),
        outputRoot: path.join(config.paths.docs, "custom-packages", packageName),
      };
    case "plugin":
      return {
        sourceRoot: path.join(config.paths.plugins, packageName),
        outputRoot: path.join(config.paths.docs, "plugins", packageName),
      };
  }
}
