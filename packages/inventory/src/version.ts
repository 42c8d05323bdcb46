import { createRequire } from "node:module";
import { z } from "zod";

const packageJsonSchema = z.object({
  version: z.string(),
});

const require = createRequire(import.meta.url);
const rawPkg: unknown = require("../package.json");
const pkg = packageJsonSchema.parse(rawPkg);

export const version: string = pkg.version;
