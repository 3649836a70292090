import { promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export async function listEntries(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath);
  return entries.sort();
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
}

export async function writeText(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, content, "utf8");
}

export async function appendText(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.appendFile(filePath, content, "utf8");
}

export async function writeBinary(filePath: string, data: Buffer): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, data);
}

/**
 * Renames `srcPath` to `destPath`. Falls back to copy + unlink only when the two paths
 * live on different devices, where a rename is not possible.
 */
export async function moveFile(srcPath: string, destPath: string): Promise<void> {
  await ensureDir(path.dirname(destPath));
  try {
    await fs.rename(srcPath, destPath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EXDEV") throw error;
    await fs.copyFile(srcPath, destPath);
    await fs.unlink(srcPath);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
