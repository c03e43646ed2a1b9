import type { EditorState, KeyBinding } from "./types";

export const createMotions = <TState extends EditorState = EditorState>(): Map<
  string,
  KeyBinding<TState>
> => {
  const motions = new Map<string, KeyBinding<TState>>();

  motions.set("ArrowLeft", {
    id: "backward-char",
    command: (state, { count }) => {
      state.selection.moveBy(-Math.max(1, count));
    },
  });

  motions.set("ArrowRight", {
    id: "forward-char",
    command: (state, { count }) => {
      state.selection.moveBy(Math.max(1, count));
    },
  });

  motions.set("Home", {
    id: "beginning-of-line",
    command: (state) => {
      const { row } = state.buffer.offsetToPosition(state.selection.getPoint());
      state.selection.movePoint(
        state.buffer.positionToOffset({ row, col: 0 }),
      );
    },
  });

  motions.set("End", {
    id: "end-of-line",
    command: (state) => {
      const { row } = state.buffer.offsetToPosition(state.selection.getPoint());
      state.selection.movePoint(
        state.buffer.positionToOffset({
          row,
          col: state.buffer.getLineLength(row),
        }),
      );
    },
  });

  return motions;
};
