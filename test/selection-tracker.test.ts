import { expect, test } from "vitest";
import { SelectionTracker } from "../src";
import type { SelectionAdapter } from "../src";
import { makeSelection } from "./helpers";

const runCommand = (tracker: SelectionTracker, command: () => void) => {
  tracker.beforeCommand();
  command();
  return tracker.afterCommand();
};

test("deactivating a selection records it", () => {
  const selection = makeSelection();
  const tracker = new SelectionTracker(selection);
  selection.setSelection(12, 4);

  const recorded = runCommand(tracker, () => selection.clearSelection());

  expect(recorded).toEqual({ point: 12, mark: 4 });
  expect(tracker.getHistory()?.toArray()).toEqual([{ point: 12, mark: 4 }]);
});

test("the ring is only allocated on the first capture", () => {
  const selection = makeSelection();
  const tracker = new SelectionTracker(selection, { capacity: 3 });
  runCommand(tracker, () => selection.movePoint(5));
  expect(tracker.getHistory()).toBeNull();

  selection.setSelection(5, 1);
  runCommand(tracker, () => selection.clearSelection());
  expect(tracker.getHistory()?.capacity).toBe(3);
});

test("nothing is recorded while the selection stays active", () => {
  const selection = makeSelection();
  const tracker = new SelectionTracker(selection);
  selection.setSelection(3, 1);

  expect(runCommand(tracker, () => selection.moveBy(2))).toBeNull();
  expect(tracker.getHistory()).toBeNull();
});

test("nothing is recorded when no selection was active before", () => {
  const selection = makeSelection();
  const tracker = new SelectionTracker(selection);
  selection.setSelection(9, 2);
  selection.clearSelection();

  expect(runCommand(tracker, () => selection.moveBy(1))).toBeNull();
});

test("an empty selection is not recorded", () => {
  const selection = makeSelection(100, 7);
  const tracker = new SelectionTracker(selection);
  selection.setMark();

  expect(runCommand(tracker, () => selection.clearSelection())).toBeNull();
  expect(tracker.getHistory()).toBeNull();
});

test("reactivating and dropping the same selection records it once", () => {
  const selection = makeSelection();
  const tracker = new SelectionTracker(selection);
  selection.setSelection(20, 10);
  runCommand(tracker, () => selection.clearSelection());
  runCommand(tracker, () => selection.exchangePointAndMark());
  runCommand(tracker, () => selection.clearSelection());

  expect(tracker.getHistory()?.toArray()).toEqual([{ point: 20, mark: 10 }]);
});

test("an unpaired afterCommand records nothing", () => {
  const selection = makeSelection();
  const tracker = new SelectionTracker(selection);
  selection.setSelection(20, 10);
  tracker.beforeCommand();
  selection.clearSelection();
  tracker.forgetActiveSelection();

  expect(tracker.afterCommand()).toBeNull();
  selection.setSelection(20, 10);
  selection.clearSelection();
  expect(tracker.afterCommand()).toBeNull();
});

test("capacity changes reach the existing ring", () => {
  const selection = makeSelection();
  const tracker = new SelectionTracker(selection, { capacity: 4 });
  for (const [point, mark] of [
    [1, 2],
    [3, 4],
    [5, 6],
  ]) {
    selection.setSelection(point, mark);
    runCommand(tracker, () => selection.clearSelection());
  }
  tracker.setCapacity(1);
  expect(tracker.getHistory()?.toArray()).toEqual([{ point: 5, mark: 6 }]);
});

test("a selection without a mark is not recorded", () => {
  let active = true;
  const selection: SelectionAdapter = {
    isSelectionActive: () => active,
    getPoint: () => 8,
    getMark: () => null,
    clearSelection: () => {
      active = false;
    },
    setSelection: () => {
      active = true;
    },
    movePoint: () => {},
  };
  const tracker = new SelectionTracker(selection);

  expect(runCommand(tracker, () => selection.clearSelection())).toBeNull();
  expect(tracker.getHistory()).toBeNull();
});
