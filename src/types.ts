import type { SelectionState } from "./selection-state";

export interface Region {
  readonly point: number;
  readonly mark: number;
}

export interface RegionBounds {
  start: number;
  end: number;
}

export interface CursorPosition {
  row: number;
  col: number;
}

export interface SelectionAdapter {
  isSelectionActive(): boolean;
  getPoint(): number;
  getMark(): number | null;
  clearSelection(): void;
  setSelection(point: number, mark: number): void;
  movePoint(offset: number): void;
}

export interface HighlightAdapter<THandle> {
  createHighlight(start: number, end: number): THandle;
  moveHighlight(handle: THandle, start: number, end: number): void;
  destroyHighlight(handle: THandle): void;
}

export interface CommandInvocation {
  event: KeyboardEvent | null;
  count: number;
}

export interface TransientBinding {
  id: string;
  run: (invocation: CommandInvocation) => void;
}

export interface TransientBindingsAdapter {
  // The returned remover does not fire onExit.
  installTransientBindings(
    bindings: ReadonlyMap<string, TransientBinding>,
    keep: (commandId: string) => boolean,
    onExit: () => void,
  ): () => void;
}

export interface PreviewKeys {
  backward: string;
  forward: string;
  activate: string;
  quit: string;
}

export type PreviewState = "inactive" | "previewing" | "activated" | "cancelled";

export type PreviewOutcome = Extract<PreviewState, "activated" | "cancelled">;

export interface SavedSelection {
  active: boolean;
  point: number;
  mark: number | null;
}

export interface TextBuffer {
  extractContent(): string;
  getLength(): number;
  lineCount(): number;
  getLineText(row: number): string;
  getLineLength(row: number): number;
  offsetToPosition(offset: number): CursorPosition;
  positionToOffset(position: CursorPosition): number;
}

export interface EditorState<TBuffer extends TextBuffer = TextBuffer> {
  buffer: TBuffer;
  selection: SelectionState;
}

export type Command<TState extends EditorState = EditorState> = (
  state: TState,
  invocation: CommandInvocation,
) => void;

export interface KeyBinding<TState extends EditorState = EditorState> {
  id: string;
  command: Command<TState>;
}

export interface ResolvedCommand<TState extends EditorState = EditorState> {
  id: string;
  command: Command<TState>;
  count: number;
}

export interface SelectionSegment {
  row: number;
  startCol: number;
  endCol: number;
}
