import * as fs from "node:fs/promises";
import * as path from "node:path";
import lockfile from "proper-lockfile";

export function isErrnoError(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && err.code === code;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function readJSON(filePath: string, defaultValue: unknown): Promise<unknown> {
  try {
    const raw = await fs.readFile(filePath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err: unknown) {
    if (isErrnoError(err, "ENOENT")) {
      return defaultValue;
    }
    throw err;
  }
}

export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}`;
  await fs.writeFile(tmpPath, content);
  await fs.rename(tmpPath, filePath);
}

export async function withLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  await ensureDir(path.dirname(lockPath));

  // proper-lockfile needs the target to exist
  try {
    await fs.access(lockPath);
  } catch {
    await fs.writeFile(lockPath, "", "utf-8");
  }

  const release = await lockfile.lock(lockPath, {
    stale: 10000,
    retries: {
      retries: 5,
      minTimeout: 200,
      maxTimeout: 5000,
    },
  });

  try {
    return await fn();
  } finally {
    await release();
  }
}
