/**
 * Filesystem watch capability.
 *
 * The repository watcher depends only on this interface; chokidar is the
 * production implementation and tests drive a fake.
 */

export type RawFsEventKind = "add" | "change" | "unlink" | "addDir" | "unlinkDir";

export const RAW_FS_EVENT_KINDS: readonly RawFsEventKind[] = [
  "add",
  "change",
  "unlink",
  "addDir",
  "unlinkDir",
];

/** One notification from the backend; `path` is absolute */
export interface RawFsEvent {
  kind: RawFsEventKind;
  path: string;
}

export interface WatchListener {
  onEvent(event: RawFsEvent): void;
  /** The watch is broken and will deliver no more events */
  onError(error: Error): void;
}

export interface WatchOptions {
  /** Absolute paths for which this returns true are neither reported nor descended into */
  ignored?: (absolutePath: string) => boolean;
}

export interface WatchHandle {
  close(): Promise<void>;
}

export interface WatchBackend {
  watch(root: string, options: WatchOptions, listener: WatchListener): WatchHandle;
}
