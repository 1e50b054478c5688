import { promises as fs } from 'node:fs';
import path from 'node:path';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
}

export function isMissingFileError(err: unknown): boolean {
  return Boolean(err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT');
}

/** Parsed JSON, or null when the file does not exist. Invalid JSON still throws. */
export async function readJsonMaybe(filePath: string): Promise<unknown> {
  try {
    const raw = await fs.readFile(filePath, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
}

export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const encoding = options.encoding || 'utf8';
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), encoding);
  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    // Windows: rename cannot overwrite an existing file
    if (err && typeof err === 'object' && 'code' in err && (err.code === 'EEXIST' || err.code === 'EPERM')) {
      await fs.rm(filePath, { force: true });
      await fs.rename(tmpPath, filePath);
      return;
    }
    throw err;
  }
}
