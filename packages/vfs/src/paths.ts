import { DEFAULT_DELIMITER } from "@keyspace/storage";
import type { Breadcrumb } from "./types";

/** Number of delimiter occurrences; the root prefix is depth 0. */
export function depthOf(prefix: string, delimiter = DEFAULT_DELIMITER): number {
  let depth = 0;
  for (let index = prefix.indexOf(delimiter); index !== -1; index = prefix.indexOf(delimiter, index + 1)) {
    depth++;
  }
  return depth;
}

export function isDirectoryPath(path: string, delimiter = DEFAULT_DELIMITER): boolean {
  return path === "" || path.endsWith(delimiter);
}

/** Parent prefix of a file or directory path; null for the root itself. */
export function parentOf(path: string, delimiter = DEFAULT_DELIMITER): string | null {
  const trimmed = trimTrailing(path, delimiter);
  if (trimmed === "") return null;
  const cut = trimmed.lastIndexOf(delimiter);
  return cut === -1 ? "" : trimmed.slice(0, cut + 1);
}

export function breadcrumbsFor(path: string, delimiter = DEFAULT_DELIMITER): Breadcrumb[] {
  const trimmed = trimTrailing(path, delimiter);
  if (trimmed === "") return [];

  let current = "";
  return trimmed.split(delimiter).map((name) => {
    current += name + delimiter;
    return { name, path: current };
  });
}

/** Display name of `child` relative to the listed `prefix`. */
export function childName(prefix: string, child: string, delimiter = DEFAULT_DELIMITER): string {
  return trimTrailing(child.slice(prefix.length), delimiter);
}

export function firstSegment(path: string, delimiter = DEFAULT_DELIMITER): string {
  const cut = path.indexOf(delimiter);
  return cut === -1 ? path : path.slice(0, cut);
}

function trimTrailing(path: string, delimiter: string): string {
  let end = path.length;
  while (end > 0 && path.startsWith(delimiter, end - delimiter.length)) {
    end -= delimiter.length;
  }
  return path.slice(0, end);
}
