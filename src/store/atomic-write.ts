import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import crypto from 'node:crypto';

/**
 * Atomically replace `filePath` with `data`.
 *
 * Sequence: write a temp file beside the target, fsync it, rename it over
 * the target, then fsync the parent directory (best-effort). A reader sees
 * either the old bytes or the new bytes, never a partial write. Any failure
 * before the rename unlinks the temp file.
 */
export async function atomicWrite(filePath: string, data: string | Uint8Array): Promise<void> {
  const dir = path.dirname(filePath);
  await fsp.mkdir(dir, { recursive: true });

  const tempPath = tempPathFor(filePath);
  let renamed = false;
  try {
    const handle = await fsp.open(tempPath, 'wx');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fsp.rename(tempPath, filePath);
    renamed = true;
  } finally {
    if (!renamed) {
      await fsp.rm(tempPath, { force: true });
    }
  }

  await fsyncDirectory(dir);
}

/** Synchronous twin of {@link atomicWrite} for state documents saved inline. */
export function atomicWriteSync(filePath: string, data: string | Uint8Array): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });

  const tempPath = tempPathFor(filePath);
  let renamed = false;
  try {
    const fd = fs.openSync(tempPath, 'wx');
    try {
      fs.writeFileSync(fd, data);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tempPath, filePath);
    renamed = true;
  } finally {
    if (!renamed) {
      fs.rmSync(tempPath, { force: true });
    }
  }

  try {
    const dirFd = fs.openSync(dir, 'r');
    try {
      fs.fsyncSync(dirFd);
    } finally {
      fs.closeSync(dirFd);
    }
  } catch {
    // Directory fsync is unsupported on some platforms
  }
}

function tempPathFor(filePath: string): string {
  const nonce = crypto.randomBytes(6).toString('hex');
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${nonce}.tmp`);
}

async function fsyncDirectory(dir: string): Promise<void> {
  try {
    const handle = await fsp.open(dir, 'r');
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch {
    // Directory fsync is unsupported on some platforms
  }
}
