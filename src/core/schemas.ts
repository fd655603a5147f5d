import { z } from "zod";
import type { DisplayValue } from "./types.js";

// Note: We use z.output<typeof Schema> for types to get the post-parse types
// with defaults applied.

// ============================================================================
// Core Enums
// ============================================================================

export const Category = z.enum([
  "core",           // The core's own package tree
  "custom-package", // A package under the custom packages root
  "plugin",         // A plugin directory under the plugins root
]);
export type Category = z.infer<typeof Category>;

// Observed from disk on every call, never stored
export const ProjectState = z.enum([
  "absent",    // No project scaffolding
  "created",   // Scaffolding exists
  "generated", // Description files have been produced
  "built",     // Final artifacts exist
]);
export type ProjectState = z.infer<typeof ProjectState>;

export const LifecycleAction = z.enum(["create", "generate", "build"]);
export type LifecycleAction = z.infer<typeof LifecycleAction>;

// ============================================================================
// Config
// ============================================================================

export const ConfigSchema = z.object({
  command: z.string().regex(/^\S+$/, "must be a single word").default("core"),
  prefix: z.string().default("[Core] "),
  description: z.string().default("Core base command."),
  debug: z.boolean().default(false),
  core: z.object({
    name: z.string().regex(/^\S+$/, "must be a single word").default("core"),
    title: z.string().default("Core"),
    author: z.string().default("Core Development Team"),
  }).default({}),
  paths: z.object({
    packages: z.string().default("packages"),
    customPackages: z.string().default("custom"),
    plugins: z.string().default("plugins"),
    docs: z.string().default("docs"),
    data: z.string().default("data"),
    logs: z.string().default("logs"),
  }).default({}),
  docs: z.object({
    sourceSubstring: z.string().min(1).optional(),
  }).default({}),
});
export type Config = z.output<typeof ConfigSchema>;

// ============================================================================
// Plugin Manifest
// ============================================================================

const Scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const PlainValueSchema = Scalar.transform(
  (value): DisplayValue => ({ kind: "plain", value })
);

const SettingValueSchema = z
  .object({
    setting: z.string(),
    help: z.string().default(""),
    value: Scalar,
  })
  .transform(
    (s): DisplayValue => ({ kind: "setting", name: s.setting, helpText: s.help, value: s.value })
  );

export const PluginManifestSchema = z.object({
  info: z.record(z.string(), z.union([PlainValueSchema, SettingValueSchema])).optional(),
});
export type PluginManifest = z.output<typeof PluginManifestSchema>;

// ============================================================================
// Credits
// ============================================================================

export const CreditsSchema = z.record(z.string(), z.record(z.string(), Scalar));
export type Credits = z.output<typeof CreditsSchema>;

// ============================================================================
// Package metadata
// ============================================================================

export const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});
