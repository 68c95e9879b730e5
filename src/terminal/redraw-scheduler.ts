/**
 * Dirty-callback adapter that turns buffer notifications into at most one
 * redraw per event-loop turn.
 *
 * VtBuffer invokes its dirty callback synchronously from inside a write.
 * This scheduler only records that a redraw is owed and defers the actual
 * work to `setImmediate`, so the redraw never runs inside a buffer mutation.
 */

export type RedrawScheduler = {
  /** Pass to `VtBuffer.setDirtyCallback`. */
  notify: () => void;
  /** Run a pending redraw now instead of waiting for the next turn. */
  flush: () => void;
  /** Drop any pending redraw and stop scheduling new ones. */
  dispose: () => void;
  isPending: () => boolean;
};

export function createRedrawScheduler(redraw: () => void): RedrawScheduler {
  let handle: NodeJS.Immediate | undefined;
  let disposed = false;

  const run = () => {
    handle = undefined;
    redraw();
  };

  return {
    notify: () => {
      if (disposed || handle) return;
      handle = setImmediate(run);
    },
    flush: () => {
      if (!handle) return;
      clearImmediate(handle);
      run();
    },
    dispose: () => {
      disposed = true;
      if (handle) clearImmediate(handle);
      handle = undefined;
    },
    isPending: () => handle !== undefined,
  };
}
