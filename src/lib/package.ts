import fs from "node:fs";
import path from "node:path";
import { isRecord } from "./utils";

interface PackageMeta {
  name?: string;
  version?: string;
}

// dist/src/lib when built, src/lib under tsx
const PACKAGE_JSON_CANDIDATES = [
  path.resolve(__dirname, "../../../package.json"),
  path.resolve(__dirname, "../../package.json")
];

export function readPackageMeta(): PackageMeta {
  const candidate = PACKAGE_JSON_CANDIDATES.find((file) => fs.existsSync(file));
  if (!candidate) {
    return {};
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(candidate, "utf8"));
  if (!isRecord(parsed)) {
    return {};
  }
  return {
    name: typeof parsed.name === "string" ? parsed.name : undefined,
    version: typeof parsed.version === "string" ? parsed.version : undefined
  };
}
