/**
 * Filesystem Workspace Adapters
 *
 * Package enumeration and the credits store, backed by local directories.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { CreditsStore, PackageCatalog } from "./types.js";
import { mappingEntries, parseDocument } from "./yaml.js";
import { CreditsSchema } from "../../core/schemas.js";
import { CreditGroups } from "../../core/types.js";
import { CoreError, compareNames } from "../../core/utils.js";

export const CREDITS_FILE = "credits.yaml";

// ============================================================================
// Package Catalog
// ============================================================================

export class FileSystemCatalog implements PackageCatalog {
  constructor(
    private readonly customPackagesDir: string,
    private readonly pluginsDir: string
  ) {}

  async customPackages(): Promise<string[]> {
    const entries = await readDir(this.customPackagesDir);
    const names = new Set(entries.map((e) => path.parse(e.name).name));
    return [...names].sort(compareNames);
  }

  async plugins(): Promise<string[]> {
    const entries = await readDir(this.pluginsDir);
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort(compareNames);
  }
}

async function readDir(dir: string) {
  try {
    return await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

// ============================================================================
// Credits
// ============================================================================

export class YamlCreditsStore implements CreditsStore {
  private readonly file: string;

  constructor(dataDir: string) {
    this.file = path.join(dataDir, CREDITS_FILE);
  }

  async read(): Promise<CreditGroups> {
    let content: string;
    try {
      content = await fs.readFile(this.file, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const doc = parseDocument(content);
    const parsed = CreditsSchema.safeParse(doc.toJS() ?? {});
    if (!parsed.success) {
      throw new CoreError(`Invalid credits file ${this.file}`, "CONFIG_INVALID", {
        issues: parsed.error.issues,
      });
    }

    const credits = parsed.data;
    return mappingEntries(doc.contents).map(([group, names]) => ({
      group,
      entries: mappingEntries(names).map(([name]): [string, string] => [name, credits[group][name]]),
    }));
  }
}
