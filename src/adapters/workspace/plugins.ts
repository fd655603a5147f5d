/**
 * Manifest Plugin Manager
 *
 * Tracks loaded plugins by their directory under the plugins root.
 * A plugin's optional `plugin.yaml` supplies the info shown by `list`:
 *
 * ```yaml
 * info:
 *   author: Someone
 *   version: "1.2"
 *   enabled:
 *     setting: my_plugin_enabled
 *     help: Enables the plugin
 *     value: 1
 * ```
 */

import * as fs from "fs/promises";
import * as path from "path";
import { PluginManager } from "./types.js";
import { mappingEntries, mappingValue, parseDocument } from "./yaml.js";
import { PluginManifestSchema } from "../../core/schemas.js";
import {
  CommandResult,
  DisplayValue,
  LoadedPlugin,
  PluginInfo,
  error,
  skipped,
  success,
} from "../../core/types.js";
import { errorMessage } from "../../core/utils.js";

export const MANIFEST_FILE = "plugin.yaml";

const PLUGIN_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export class ManifestPluginManager implements PluginManager {
  private plugins = new Map<string, LoadedPlugin>();

  constructor(private readonly pluginsDir: string) {}

  isLoaded(name: string): boolean {
    return this.plugins.has(name);
  }

  loaded(): LoadedPlugin[] {
    return [...this.plugins.values()];
  }

  async load(name: string): Promise<CommandResult<LoadedPlugin>> {
    const existing = this.plugins.get(name);
    if (existing) {
      return skipped(existing, `Unable to load plugin "${name}" as it is already loaded.`);
    }

    if (!PLUGIN_NAME.test(name) || !(await this.pluginExists(name))) {
      return error(`Unable to load plugin "${name}" as it does not exist.`, "NOT_FOUND");
    }

    let info: PluginInfo | null;
    try {
      info = await this.readInfo(name);
    } catch (err) {
      return error(`Unable to load plugin "${name}".`, "CONFIG_INVALID", errorMessage(err));
    }

    const plugin: LoadedPlugin = { name, info };
    this.plugins.set(name, plugin);
    return success(plugin, `Successfully loaded plugin "${name}".`);
  }

  async unload(name: string): Promise<CommandResult<string>> {
    if (!this.plugins.delete(name)) {
      return skipped(name, `Unable to unload plugin "${name}" as it is not currently loaded.`);
    }
    return success(name, `Successfully unloaded plugin "${name}".`);
  }

  private async pluginExists(name: string): Promise<boolean> {
    try {
      const stat = await fs.stat(path.join(this.pluginsDir, name));
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  private async readInfo(name: string): Promise<PluginInfo | null> {
    let content: string;
    try {
      content = await fs.readFile(path.join(this.pluginsDir, name, MANIFEST_FILE), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw err;
    }

    const doc = parseDocument(content);
    const info = PluginManifestSchema.parse(doc.toJS() ?? {}).info;
    if (!info) {
      return null;
    }
    return {
      items: mappingEntries(mappingValue(doc.contents, "info")).map(([key]): [string, DisplayValue] => [
        key,
        info[key],
      ]),
    };
  }
}
