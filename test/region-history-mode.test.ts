import { expect, test } from "vitest";
import {
  EmptyHistoryError,
  RegionHistoryMode,
  SessionAlreadyActiveError,
} from "../src";
import type { FakeHighlight } from "./helpers";
import { FakeBindings, FakeHighlighter, makeSelection } from "./helpers";

const setup = (capacity?: number) => {
  const selection = makeSelection();
  const highlighter = new FakeHighlighter();
  const bindings = new FakeBindings();
  const messages: string[] = [];
  const mode = new RegionHistoryMode<FakeHighlight>({
    selection,
    highlighter,
    bindings,
    capacity,
    keys: { backward: "Ctrl+p", forward: "Ctrl+n" },
    notify: (message) => messages.push(message),
  });
  const run = (command: () => void) => {
    mode.beforeCommand();
    command();
    mode.afterCommand();
  };
  const select = (point: number, mark: number) => {
    run(() => selection.setSelection(point, mark));
    run(() => selection.clearSelection());
  };
  return { mode, selection, highlighter, bindings, messages, run, select };
};

test("records regions as commands deactivate them", () => {
  const { mode, select } = setup(3);
  select(1, 5);
  select(10, 20);
  select(1, 5);
  select(30, 40);

  expect(mode.getHistory()?.toArray()).toEqual([
    { point: 30, mark: 40 },
    { point: 10, mark: 20 },
    { point: 1, mark: 5 },
  ]);
});

test("preview before anything was recorded is refused", () => {
  const { mode, highlighter } = setup();
  expect(() => mode.startPreview()).toThrow(EmptyHistoryError);
  expect(mode.getSession()).toBeNull();
  expect(highlighter.created).toEqual([]);
});

test("a second preview is refused while one is running", () => {
  const { mode, select } = setup();
  select(1, 5);
  const session = mode.startPreview();
  expect(() => mode.startPreview()).toThrow(SessionAlreadyActiveError);
  expect(mode.getSession()).toBe(session);

  session.quit();
  expect(mode.isPreviewing()).toBe(false);
  expect(mode.startPreview()).not.toBe(session);
});

test("starting a preview over an active selection does not record it", () => {
  const { mode, selection, run, select } = setup();
  select(1, 5);
  run(() => selection.setSelection(50, 60));
  mode.beforeCommand();
  mode.startPreview();
  mode.afterCommand();

  expect(mode.getHistory()?.toArray()).toEqual([{ point: 1, mark: 5 }]);
  expect(mode.getSession()?.getRegion()).toEqual({ point: 1, mark: 5 });
});

test("custom keys reach the bindings and the usage hint", () => {
  const { mode, bindings, messages, select } = setup();
  select(1, 5);
  mode.startPreview();

  expect([...(bindings.bindings?.keys() ?? [])]).toEqual([
    "Ctrl+p",
    "Ctrl+n",
    "Enter",
    "Escape",
  ]);
  expect(messages).toEqual([
    "Ctrl+p/Ctrl+n: cycle regions, Enter: select, Escape: cancel",
  ]);
});

test("hooks registered on the mode fire for its sessions", () => {
  const { mode, select } = setup();
  const calls: string[] = [];
  const remove = mode.hooks.beforePreviewStart.add(() => calls.push("start"));
  mode.hooks.afterPreviewEnd.add((outcome) => calls.push(outcome));
  select(1, 5);

  mode.startPreview().quit();
  remove();
  mode.startPreview().activate();

  expect(calls).toEqual(["start", "cancelled", "activated"]);
});

test("capacity can be changed after regions were recorded", () => {
  const { mode, select } = setup(5);
  select(1, 2);
  select(3, 4);
  select(5, 6);
  mode.setCapacity(2);
  expect(mode.getHistory()?.toArray()).toEqual([
    { point: 5, mark: 6 },
    { point: 3, mark: 4 },
  ]);
});
