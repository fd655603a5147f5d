/**
 * Package metadata, read from the package's own package.json.
 */

import * as fs from "fs/promises";
import { PackageJsonSchema } from "./schemas.js";

export interface PackageInfo {
  name: string;
  version: string;
}

const PACKAGE_JSON = new URL("../../package.json", import.meta.url);

export async function readPackageInfo(): Promise<PackageInfo> {
  const content = await fs.readFile(PACKAGE_JSON, "utf-8");
  return PackageJsonSchema.parse(JSON.parse(content));
}
