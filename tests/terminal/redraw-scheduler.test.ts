import { describe, expect, it, vi } from 'vitest';
import { createRedrawScheduler } from '../../src/terminal/redraw-scheduler.js';
import { VtBuffer } from '../../src/terminal/vt-buffer.js';
import { VtParser } from '../../src/terminal/vt-parser.js';

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('createRedrawScheduler', () => {
  it('coalesces notifications into one redraw per turn', async () => {
    const redraw = vi.fn();
    const scheduler = createRedrawScheduler(redraw);

    scheduler.notify();
    scheduler.notify();
    scheduler.notify();
    expect(scheduler.isPending()).toBe(true);
    expect(redraw).not.toHaveBeenCalled();

    await nextTurn();
    expect(redraw).toHaveBeenCalledTimes(1);
    expect(scheduler.isPending()).toBe(false);

    scheduler.notify();
    await nextTurn();
    expect(redraw).toHaveBeenCalledTimes(2);
  });

  it('runs a pending redraw on flush and not again later', async () => {
    const redraw = vi.fn();
    const scheduler = createRedrawScheduler(redraw);

    scheduler.flush();
    expect(redraw).not.toHaveBeenCalled();

    scheduler.notify();
    scheduler.flush();
    expect(redraw).toHaveBeenCalledTimes(1);

    await nextTurn();
    expect(redraw).toHaveBeenCalledTimes(1);
  });

  it('drops pending work and ignores notifications after dispose', async () => {
    const redraw = vi.fn();
    const scheduler = createRedrawScheduler(redraw);

    scheduler.notify();
    scheduler.dispose();
    scheduler.notify();
    expect(scheduler.isPending()).toBe(false);

    await nextTurn();
    expect(redraw).not.toHaveBeenCalled();
  });

  it('lets the redraw read and mutate the buffer outside the write', async () => {
    const buffer = new VtBuffer(10, 3);
    const parser = new VtParser(buffer);
    const cursors: Array<{ x: number; y: number }> = [];
    const scheduler = createRedrawScheduler(() => {
      cursors.push(buffer.getCursor());
      buffer.clearDirty();
      buffer.setCursorVisible(false);
    });
    buffer.setDirtyCallback(scheduler.notify);

    parser.parseString('hello\r\nworld');
    await nextTurn();

    expect(cursors).toEqual([{ x: 5, y: 1 }]);
    expect(buffer.isCursorVisible()).toBe(false);
    // The mutation inside the redraw notified again.
    expect(scheduler.isPending()).toBe(true);
    scheduler.dispose();
  });
});
