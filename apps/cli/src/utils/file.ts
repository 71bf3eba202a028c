import fs from "fs/promises";
import path from "path";
import type { z } from "zod";

/**
 * Reads and validates a JSON file. Returns `null` when the file does not
 * exist; throws when it exists but does not match `schema`.
 */
export const readJSON = async <T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | null> => {
  if (!(await fileExists(filePath))) {
    return null;
  }

  const content = await fs.readFile(filePath, "utf8");
  return schema.parse(JSON.parse(content));
};

export const writeJSON = async <T>(filePath: string, data: T) => {
  await writeText(filePath, `${JSON.stringify(data, null, 2)}\n`);
};

export const writeText = async (filePath: string, content: string) => {
  // Ensure directory exists
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
};

export const fileExists = async (filePath: string) => {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
};

export interface FileSignature {
  size: number;
  mtimeMs: number;
}

/** Size and modification time, enough to notice an edited or replaced file. */
export const fileSignature = async (filePath: string): Promise<FileSignature> => {
  const stat = await fs.stat(filePath);
  return { size: stat.size, mtimeMs: stat.mtimeMs };
};
