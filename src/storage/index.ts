export {
  ensureDir,
  isErrnoError,
  readJSON,
  writeFileAtomic,
  withLock,
} from "./engine.js";

export { classifyFile, findScanFiles } from "./files.js";
export type { ScanFileSet } from "./files.js";
