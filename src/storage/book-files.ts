import { mkdirSync, writeFileSync } from "fs";
import { basename, join, resolve } from "path";

/**
 * Save an uploaded book under `<booksDir>/<userKey>/<fileName>`.
 * Only the base name of `fileName` is used, so uploads cannot escape
 * the user's directory.
 * @returns Absolute path of the stored file
 */
export function saveUploadedFile(
  booksDir: string,
  userKey: string,
  fileName: string,
  content: Buffer
): string {
  const safeName = basename(fileName);
  const safeUser = basename(userKey);

  if (!safeName || safeName === "." || safeName === "..") {
    throw new Error(`Invalid file name: ${fileName}`);
  }
  if (!safeUser || safeUser === "." || safeUser === "..") {
    throw new Error(`Invalid user key: ${userKey}`);
  }

  const userDir = resolve(booksDir, safeUser);
  mkdirSync(userDir, { recursive: true });

  const filePath = join(userDir, safeName);
  writeFileSync(filePath, content);

  return filePath;
}
