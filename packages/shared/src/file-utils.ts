import fs from "node:fs/promises";

export function reasonFromCode(code: string | undefined) {
  const reason = code || 'UNKNOWN';
  const map: Record<string, string> = {
    EACCES: 'permission_denied',
    EPERM: 'operation_not_permitted',
    ENOENT: 'file_not_found',
    EISDIR: 'is_a_directory',
    ELOOP: 'symlink_loop',
    ENOTDIR: 'not_a_directory'
  };
  return map[reason] || reason.toLowerCase();
}

export function extractErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object'
    && error !== null && 'code' in error
    && typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Read a whole file as raw bytes.
 * `label` prefixes the error so the caller's flag shows up in the message
 * (ex: `[--factors]: file_not_found ./nga.csv`).
 */
export async function readBytes(file: string, label: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(file);
  } catch (error) {
    const code = extractErrorCode(error);
    if (code === undefined) throw error;
    throw new Error(`[${label}]: ${reasonFromCode(code)} ${file}`, { cause: error });
  }
}
