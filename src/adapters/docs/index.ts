/**
 * Documentation Project Exports
 */

export type { DocsProject, DocsProjectFactory, ProjectMetadata } from "./types.js";

export { SphinxProject, createSphinxFactory, runTool, type ToolRunner } from "./sphinx.js";
