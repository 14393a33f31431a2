/**
 * chokidar implementation of WatchBackend.
 */

import { watch } from "chokidar";
import {
  RAW_FS_EVENT_KINDS,
  type RawFsEventKind,
  type WatchBackend,
  type WatchHandle,
  type WatchListener,
  type WatchOptions,
} from "./types.js";

function isRawKind(event: string): event is RawFsEventKind {
  return RAW_FS_EVENT_KINDS.some((kind) => kind === event);
}

export class ChokidarBackend implements WatchBackend {
  watch(root: string, options: WatchOptions, listener: WatchListener): WatchHandle {
    const ignored = options.ignored;
    const watcher = watch(root, {
      persistent: true,
      // Existing files are not activity
      ignoreInitial: true,
      disableGlobbing: true,
      ignored: ignored ? (p: string) => ignored(p) : undefined,
    });

    watcher
      .on("all", (event, filePath) => {
        if (isRawKind(event)) listener.onEvent({ kind: event, path: filePath });
      })
      .on("error", (error) => {
        listener.onError(error instanceof Error ? error : new Error(String(error)));
      });

    return {
      close: () => watcher.close(),
    };
  }
}
