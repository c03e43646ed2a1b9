import type { EditorState, KeyBinding } from "./types";
import { createMotions } from "./motions";

export const START_PREVIEW_COMMAND = "region-history-preview";

export const createEditingKeymap = <TState extends EditorState = EditorState>(
  startPreview: () => void,
  options?: {
    extendCommands?: (commands: Map<string, KeyBinding<TState>>) => void;
  },
): Map<string, KeyBinding<TState>> => {
  const commands = createMotions<TState>();

  commands.set("Ctrl+Space", {
    id: "set-mark",
    command: (state) => {
      state.selection.setMark();
    },
  });

  commands.set("Ctrl+x", {
    id: "exchange-point-and-mark",
    command: (state) => {
      state.selection.exchangePointAndMark();
    },
  });

  commands.set("Escape", {
    id: "keyboard-quit",
    command: (state) => {
      state.selection.clearSelection();
    },
  });

  commands.set("Alt+r", {
    id: START_PREVIEW_COMMAND,
    command: () => startPreview(),
  });

  options?.extendCommands?.(commands);
  return commands;
};
