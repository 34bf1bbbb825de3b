import { describe, expect, it, vi } from "vitest";

import { createInputWaitWatcher } from "../src/core/terminal.js";

import { createFakeGrid, createManualDispatch, syncDispatch } from "./support/fake-grid.js";

describe("input wait watcher", () => {
  it("reports edges only when a prompt appears or goes away", () => {
    const onStateChanged = vi.fn();
    const watcher = createInputWaitWatcher({ onStateChanged, dispatch: syncDispatch });
    const grid = createFakeGrid(10);
    watcher.attach(grid);

    grid.setLine(9, "Continue? [y/n]");
    grid.emit(9, 9);
    grid.emit(9, 9);
    expect(onStateChanged.mock.calls).toEqual([[true]]);
    expect(watcher.isWaitingForInput).toBe(true);

    grid.setLine(8, "⠋ working");
    grid.emit(8, 8);
    expect(onStateChanged.mock.calls).toEqual([[true], [false]]);
    expect(watcher.isWaitingForInput).toBe(false);
  });

  it("ignores ranges that end above the bottom rows", () => {
    const onStateChanged = vi.fn();
    const watcher = createInputWaitWatcher({ onStateChanged, dispatch: syncDispatch });
    const grid = createFakeGrid(10);
    watcher.attach(grid);

    grid.setLine(9, "? Pick one");
    grid.emit(0, 4);
    expect(onStateChanged).not.toHaveBeenCalled();
    expect(grid.reads).toBe(0);

    grid.emit(0, 5);
    expect(onStateChanged).toHaveBeenCalledWith(true);
  });

  it("only looks at the bottom five rows", () => {
    const onStateChanged = vi.fn();
    const watcher = createInputWaitWatcher({ onStateChanged, dispatch: syncDispatch });
    const grid = createFakeGrid(10);
    watcher.attach(grid);

    grid.setLine(4, "Proceed? (y/n)");
    watcher.processRange(grid, 0, 9);
    expect(watcher.isWaitingForInput).toBe(false);
    expect(grid.reads).toBe(5);
  });

  it("does nothing for an empty grid", () => {
    const watcher = createInputWaitWatcher({ dispatch: syncDispatch });
    const grid = createFakeGrid(0);
    watcher.attach(grid);
    watcher.processRange(grid, 0, 0);
    expect(watcher.isWaitingForInput).toBe(false);
    expect(grid.reads).toBe(0);
  });

  it("drops queued deliveries on detach and unsubscribes", () => {
    const manual = createManualDispatch();
    const onStateChanged = vi.fn();
    const watcher = createInputWaitWatcher({ onStateChanged, dispatch: manual.dispatch });
    const grid = createFakeGrid(6);

    watcher.attach(grid);
    watcher.attach(grid);
    expect(grid.listenerCount()).toBe(1);

    grid.setLine(5, "Press any key");
    grid.emit(5, 5);
    expect(manual.pending()).toBe(1);

    watcher.detach();
    watcher.detach();
    manual.flush();

    expect(onStateChanged).not.toHaveBeenCalled();
    expect(grid.listenerCount()).toBe(0);
    expect(watcher.isWaitingForInput).toBe(false);
  });

  it("reports a prompt still on screen after re-attach when the earlier edge was dropped", () => {
    const manual = createManualDispatch();
    const onStateChanged = vi.fn();
    const watcher = createInputWaitWatcher({ onStateChanged, dispatch: manual.dispatch });
    const grid = createFakeGrid(6);
    watcher.attach(grid);

    grid.setLine(5, "Overwrite? [y/N]");
    grid.emit(5, 5);
    watcher.detach();
    manual.flush();

    watcher.attach(grid);
    grid.emit(5, 5);
    grid.emit(5, 5);
    manual.flush();

    expect(onStateChanged.mock.calls).toEqual([[true]]);
    expect(watcher.isWaitingForInput).toBe(true);
  });

  it("ignores processRange calls while detached", () => {
    const onStateChanged = vi.fn();
    const watcher = createInputWaitWatcher({ onStateChanged, dispatch: syncDispatch });
    const grid = createFakeGrid(6);
    watcher.attach(grid);
    watcher.detach();

    grid.setLine(5, "Continue? [y/n]");
    watcher.processRange(grid, 0, 5);

    expect(onStateChanged).not.toHaveBeenCalled();
    expect(watcher.isWaitingForInput).toBe(false);
    expect(grid.reads).toBe(0);
  });
});
