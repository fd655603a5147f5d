/**
 * Category Resolver
 *
 * Classifies a package name as the core tree, a custom package or a plugin.
 * Checked in that order; the first match wins.
 */

import type { PackageCatalog } from "../adapters/workspace/types.js";
import type { Category } from "./schemas.js";

export async function classify(
  packageName: string,
  coreName: string,
  catalog: PackageCatalog
): Promise<Category | null> {
  if (packageName === coreName) {
    return "core";
  }
  if ((await catalog.customPackages()).includes(packageName)) {
    return "custom-package";
  }
  if ((await catalog.plugins()).includes(packageName)) {
    return "plugin";
  }
  return null;
}

export function rejectionMessage(packageName: string, coreName: string): string {
  return `"${packageName}" is not ${coreName}, a custom package or a plugin.`;
}
