import fs, { constants } from 'node:fs';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return isNodeError(error) && typeof error.code === 'string' && codes.includes(error.code);
}

/**
 * Moves a file without ever replacing `to`: fails with EEXIST when it exists.
 * Filesystems without hard links fall back to an exclusive copy.
 */
export async function moveFileExclusive(from: string, to: string): Promise<void> {
  try {
    await fs.promises.link(from, to);
  } catch (error) {
    if (!hasErrorCode(error, 'EXDEV', 'EPERM', 'ENOTSUP', 'EOPNOTSUPP')) {
      throw error;
    }
    await fs.promises.copyFile(from, to, constants.COPYFILE_EXCL);
  }
  await fs.promises.unlink(from);
}

/**
 * Identity of a file's current contents, or null when it does not exist.
 * Atomic rewrites (tmp file + rename) always change the inode.
 */
export function fileSignature(filePath: string): string | null {
  try {
    const stat = fs.statSync(filePath);
    return `${stat.ino}:${stat.mtimeMs}:${stat.size}`;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}
