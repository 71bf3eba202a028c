import fs from "fs/promises";
import path from "path";

export const MEDIA_EXTENSIONS = new Set([
  // video
  ".mp4",
  ".mkv",
  ".mov",
  ".webm",
  ".avi",
  ".wmv",
  ".m4v",
  ".mts",
  ".m2ts",
  // audio
  ".wav",
  ".mp3",
  ".m4a",
  ".aac",
  ".flac",
  ".ogg",
  ".opus",
  ".wma",
]);

export const isMediaFile = (file: string) =>
  MEDIA_EXTENSIONS.has(path.extname(file).toLowerCase());

/**
 * Media files under `input`: the file itself, or the directory's media files
 * (recursively on request) sorted by name.
 */
export async function collectInputs(input: string, recursive = false): Promise<string[]> {
  const stat = await fs.stat(input);
  if (stat.isFile()) {
    return isMediaFile(input) ? [input] : [];
  }

  const entries = await fs.readdir(input, { withFileTypes: true, recursive });
  return entries
    .filter((entry) => entry.isFile() && isMediaFile(entry.name))
    .map((entry) => path.join(entry.parentPath ?? entry.path, entry.name))
    .sort((a, b) =>
      path.basename(a).toLowerCase().localeCompare(path.basename(b).toLowerCase())
    );
}

/** Deepest directory containing every file. */
export function commonDirectory(files: string[]): string {
  const [first, ...rest] = files.map((file) => path.dirname(path.resolve(file)).split(path.sep));
  if (!first) return path.resolve(".");

  let length = first.length;
  for (const parts of rest) {
    let shared = 0;
    while (shared < Math.min(length, parts.length) && parts[shared] === first[shared]) shared++;
    length = shared;
  }
  return first.slice(0, length).join(path.sep) || path.sep;
}

/**
 * Output name (relative path without extension) per file. Sub-directories
 * under `root` are mirrored; files that would still share a name keep their
 * extension (`talk.mp4`, `talk.mkv`).
 */
export function outputNames(
  files: string[],
  root: string = commonDirectory(files)
): Map<string, string> {
  const relative = (file: string) => {
    const rel = path.relative(root, path.resolve(file));
    return rel.startsWith("..") || path.isAbsolute(rel) ? path.basename(file) : rel;
  };
  const withoutExtension = (rel: string) =>
    path.join(path.dirname(rel), path.basename(rel, path.extname(rel)));

  const counts = new Map<string, number>();
  for (const file of files) {
    const name = withoutExtension(relative(file));
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  return new Map(
    files.map((file): [string, string] => {
      const rel = relative(file);
      const name = withoutExtension(rel);
      return [file, (counts.get(name) ?? 0) > 1 ? rel : name];
    })
  );
}
