import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";

const packageJsonSchema = z.object({
  version: z.string(),
});

/**
 * The version from package.json, which sits one level above both src/ and dist/.
 */
export function getVersion(): string {
  const raw = readFileSync(join(__dirname, "..", "package.json"), "utf-8");
  return packageJsonSchema.parse(JSON.parse(raw)).version;
}
