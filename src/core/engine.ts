/**
 * Core Engine
 *
 * Composition root: owns the sub-command registry, wires the built-in
 * sub-commands to their collaborators and registers the whole tree as one
 * top-level command on a host. Construct one per process at start-up and
 * detach it on shutdown.
 */

import { SubCommandRegistry } from "./registry.js";
import { dispatch, dispatchTokens } from "./dispatcher.js";
import { LifecycleEngine } from "./lifecycle.js";
import { ResolvedConfig, loadConfig } from "./config.js";
import { readPackageInfo } from "./package-info.js";
import { CommandHandler, OutputSink, RegisterOptions } from "./types.js";
import { CoreServices, registerBuiltins } from "./commands/index.js";
import { DocsProjectFactory, createSphinxFactory } from "../adapters/docs/index.js";
import {
  CreditsStore,
  FileSystemCatalog,
  ManifestPluginManager,
  PackageCatalog,
  PluginManager,
  YamlCreditsStore,
} from "../adapters/workspace/index.js";
import { CommandHost, Scheduler } from "../adapters/host/index.js";

/**
 * Options for creating a CoreEngine instance.
 */
export interface CoreEngineOptions {
  config: ResolvedConfig;
  version: string;
  sink: OutputSink;
  host: CommandHost;
  scheduler: Scheduler;

  /**
   * Documentation project factory.
   * If not provided, defaults to Sphinx.
   */
  projects?: DocsProjectFactory;

  catalog?: PackageCatalog;
  plugins?: PluginManager;
  credits?: CreditsStore;

  /**
   * Externally supplied sub-command trees, mounted by name
   * (an authentication tree, for instance).
   */
  trees?: Record<string, SubCommandRegistry>;
}

/**
 * Usage:
 * ```typescript
 * const engine = await createEngine({ rootDir, sink, host, scheduler });
 * engine.attach();
 *
 * await host.execute("core docs create core");
 *
 * // Plugins may add or override sub-commands at any time
 * engine.register("hello", (args, ctx) => ctx.reporter.info("hi"));
 * ```
 */
export class CoreEngine {
  readonly registry: SubCommandRegistry;
  readonly services: CoreServices;
  private readonly sink: OutputSink;

  constructor(options: CoreEngineOptions) {
    const { config } = options;
    this.sink = options.sink;
    this.registry = new SubCommandRegistry(config.command, config.prefix, config.description);

    this.services = {
      config,
      version: options.version,
      lifecycle: new LifecycleEngine({
        config,
        version: options.version,
        projects: options.projects ?? createSphinxFactory(),
      }),
      catalog:
        options.catalog ?? new FileSystemCatalog(config.paths.customPackages, config.paths.plugins),
      plugins: options.plugins ?? new ManifestPluginManager(config.paths.plugins),
      credits: options.credits ?? new YamlCreditsStore(config.paths.data),
      scheduler: options.scheduler,
      host: options.host,
    };

    registerBuiltins(this.registry, this.services);

    for (const [name, tree] of Object.entries(options.trees ?? {})) {
      this.registry.registerTree(name, tree);
    }
  }

  get config(): ResolvedConfig {
    return this.services.config;
  }

  get lifecycle(): LifecycleEngine {
    return this.services.lifecycle;
  }

  // ==========================================================================
  // Registration (delegated to the registry)
  // ==========================================================================

  register(name: string, handler: CommandHandler, options?: RegisterOptions): void {
    this.registry.register(name, handler, options);
  }

  registerTree(name: string, tree: SubCommandRegistry): void {
    this.registry.registerTree(name, tree);
  }

  unregister(name: string): void {
    this.registry.unregister(name);
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  dispatch(line: string): Promise<void> {
    return dispatch(this.registry, line, { sink: this.sink, debug: this.debug });
  }

  dispatchTokens(tokens: readonly string[]): Promise<void> {
    return dispatchTokens(this.registry, tokens, { sink: this.sink, debug: this.debug });
  }

  // ==========================================================================
  // Host
  // ==========================================================================

  /**
   * Register the registry as a top-level command on the host.
   */
  attach(): void {
    this.services.host.registerCommand(this.config.command, (tokens) => this.dispatchTokens(tokens));
  }

  detach(): void {
    this.services.host.unregisterCommand(this.config.command);
  }

  private get debug(): boolean {
    return this.config.debug || Boolean(process.env.DEBUG);
  }
}

export interface CreateEngineOptions extends Omit<CoreEngineOptions, "config" | "version"> {
  /** Directory the configured paths are relative to (defaults to cwd) */
  rootDir?: string;

  /** Configuration file, relative to rootDir */
  configFile?: string;
}

/**
 * Load configuration and package metadata, then create an engine.
 */
export async function createEngine(options: CreateEngineOptions): Promise<CoreEngine> {
  const config = await loadConfig(options.rootDir ?? process.cwd(), options.configFile);
  const { version } = await readPackageInfo();
  return new CoreEngine({ ...options, config, version });
}
