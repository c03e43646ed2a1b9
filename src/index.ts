export type * from "./types";
export * from "./errors";
export * from "./region";
export { RegionHistory, DEFAULT_CAPACITY } from "./region-history";
export { SelectionTracker } from "./selection-tracker";
export {
  PreviewSession,
  PREVIEW_COMMANDS,
  DEFAULT_PREVIEW_KEYS,
  createPreviewHooks,
  formatUsageHint,
} from "./preview-session";
export type { PreviewHooks, PreviewSessionOptions } from "./preview-session";
export { RegionHistoryMode } from "./region-history-mode";
export type { RegionHistoryModeOptions } from "./region-history-mode";
export { HookList } from "./hook-list";
export type { Hook } from "./hook-list";
export { isDebugEnabled, setDebugEnabled, setDebugSink } from "./debug";
export type { DebugSink } from "./debug";
export { SelectionState } from "./selection-state";
export { EditorBuffer } from "./editor-buffer";
export { initializeEditorDom } from "./editor-dom";
export type { EditorDom } from "./editor-dom";
export {
  DomHighlighter,
  calculateSegments,
  renderSegments,
} from "./dom-highlighter";
export { KeyMapper } from "./key-mapper";
export { CommandExecutor } from "./command-executor";
export type { CommandHooks } from "./command-executor";
export { createMotions } from "./motions";
export { createEditingKeymap, START_PREVIEW_COMMAND } from "./editing-keymap";
export { RegionHistoryController, createFullEditor } from "./controller";
export type { RegionHistoryControllerOptions } from "./controller";
