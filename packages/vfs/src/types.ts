import type { ObjectProbe } from "@keyspace/storage";

/** Recursive aggregate over every object under a prefix. */
export interface DirStats {
  size: bigint;
  count: number;
  /** Latest modification among descendants; null when `count` is 0. */
  modified: Date | null;
}

export type StatsSource = "snapshot" | "live";

export type MissReason = "no_snapshot" | "stale" | "beyond_depth";

export interface StatsLookup {
  stats: DirStats;
  source: StatsSource;
  reason?: MissReason;
}

export interface Breadcrumb {
  name: string;
  path: string;
}

export interface DirectoryEntry {
  name: string;
  prefix: string;
  size: bigint;
  sizeDisplay: string;
  count: number;
  modified: Date | null;
  source: StatsSource;
}

export interface FileEntry {
  name: string;
  key: string;
  size: number;
  sizeDisplay: string;
  modified: Date;
}

export interface DirectoryView {
  prefix: string;
  parent: string | null;
  breadcrumbs: Breadcrumb[];
  directories: DirectoryEntry[];
  files: FileEntry[];
  totalSize: bigint;
  totalSizeDisplay: string;
  /** Recursive object count: child directory counts plus direct files. */
  totalCount: number;
  directoryCount: number;
  fileCount: number;
}

export type PathState = "IS_FILE" | "IS_DIR" | "IS_DIR_NO_SLASH" | "NOT_FOUND";

export type PathClassification =
  | { state: "IS_FILE"; meta: ObjectProbe }
  | { state: "IS_DIR" }
  | { state: "IS_DIR_NO_SLASH"; canonical: string }
  | { state: "NOT_FOUND" };

export type RedirectReason = "missing_delimiter" | "legacy_query" | "inline_marker";

export type ResolvedState =
  | { kind: "file"; state: "IS_FILE"; meta: ObjectProbe; inline: boolean }
  | { kind: "directory"; state: "IS_DIR"; view: DirectoryView }
  | { kind: "redirect"; target: string; permanent: boolean; reason: RedirectReason }
  | { kind: "not_found"; state: "NOT_FOUND"; reason: "reserved" | "missing" };

export type QueryParams = Record<string, string | string[] | undefined>;

export interface ResolveRequest {
  /** Decoded request path without its leading slash. */
  path: string;
  query?: QueryParams;
}
