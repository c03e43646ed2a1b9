import type {
  CursorPosition,
  EditorState,
  KeyBinding,
  PreviewKeys,
  Region,
} from "./types";
import type { EditorBuffer } from "./editor-buffer";
import type { EditorDom } from "./editor-dom";
import { initializeEditorDom } from "./editor-dom";
import { SelectionState } from "./selection-state";
import { KeyMapper } from "./key-mapper";
import { CommandExecutor } from "./command-executor";
import { createEditingKeymap } from "./editing-keymap";
import {
  calculateSegments,
  DomHighlighter,
  renderSegments,
} from "./dom-highlighter";
import { RegionHistoryMode } from "./region-history-mode";
import { SelectionHistoryError } from "./errors";
import { regionBounds } from "./region";

const SELECTION_COLOR = "rgba(0, 0, 255, 0.2)";

export interface RegionHistoryControllerOptions {
  dom: EditorDom;
  initialPoint?: number;
  capacity?: number;
  showUsageHint?: boolean;
  previewKeys?: Partial<PreviewKeys>;
  onMessage?: (message: string) => void;
  extendCommands?: (
    commands: Map<string, KeyBinding<EditorState<EditorBuffer>>>,
  ) => void;
}

export class RegionHistoryController {
  private selectionOverlay: HTMLDivElement;
  private cursorSpan: HTMLSpanElement;
  private state: EditorState<EditorBuffer>;
  private keyMapper: KeyMapper<EditorState<EditorBuffer>>;
  private executor: CommandExecutor<EditorState<EditorBuffer>>;
  private mode: RegionHistoryMode<HTMLDivElement>;
  private messages: string[] = [];
  private onMessage: ((message: string) => void) | undefined;

  constructor(options: RegionHistoryControllerOptions) {
    const { dom, initialPoint = 0, capacity, showUsageHint } = options;

    this.selectionOverlay = dom.selectionOverlay;
    this.cursorSpan = dom.cursorSpan;
    this.onMessage = options.onMessage;

    this.state = {
      buffer: dom.buffer,
      selection: new SelectionState(dom.buffer, initialPoint),
    };

    this.keyMapper = new KeyMapper(
      createEditingKeymap<EditorState<EditorBuffer>>(
        () => {
          this.mode.startPreview();
        },
        { extendCommands: options.extendCommands },
      ),
    );
    this.mode = new RegionHistoryMode<HTMLDivElement>({
      selection: this.state.selection,
      highlighter: new DomHighlighter(dom.highlightOverlay, dom.buffer),
      bindings: this.keyMapper,
      capacity,
      showUsageHint,
      keys: options.previewKeys,
      notify: (message) => this.message(message),
    });
    this.executor = new CommandExecutor(
      this.state,
      this.keyMapper,
      this.mode,
    );

    this.updateSelectionOverlay();
    this.updateCursorSpan();
  }

  public getMode(): RegionHistoryMode<HTMLDivElement> {
    return this.mode;
  }

  public getPoint(): number {
    return this.state.selection.getPoint();
  }

  public getMark(): number | null {
    return this.state.selection.getMark();
  }

  public isSelectionActive(): boolean {
    return this.state.selection.isSelectionActive();
  }

  public getCursorPosition(): CursorPosition {
    return this.state.buffer.offsetToPosition(this.getPoint());
  }

  public getRegions(): Region[] {
    return this.mode.getHistory()?.toArray() ?? [];
  }

  public getMessages(): string[] {
    return [...this.messages];
  }

  public extractContent(): string {
    return this.state.buffer.extractContent();
  }

  public processKeyboardEvent(event: KeyboardEvent) {
    const resolved = this.keyMapper.resolve(event);
    if (resolved) {
      event.preventDefault();
      try {
        this.executor.run(resolved, event);
      } catch (error) {
        if (!(error instanceof SelectionHistoryError)) throw error;
        this.message(error.message);
      }
    }
    this.state.selection.clampToBuffer();
    this.updateSelectionOverlay();
    this.updateCursorSpan();
  }

  private message(text: string): void {
    this.messages.push(text);
    this.onMessage?.(text);
  }

  private updateSelectionOverlay(): void {
    const mark = this.state.selection.getMark();
    if (!this.state.selection.isSelectionActive() || mark === null) {
      this.selectionOverlay.replaceChildren();
      return;
    }
    const { start, end } = regionBounds({ point: this.getPoint(), mark });
    renderSegments(
      this.selectionOverlay,
      calculateSegments(this.state.buffer, start, end),
      SELECTION_COLOR,
    );
  }

  private updateCursorSpan() {
    const { row, col } = this.getCursorPosition();
    const lineText = this.state.buffer.getLineText(row);
    this.cursorSpan.style.top = `${row}em`;
    this.cursorSpan.style.left = `${col}ch`;
    this.cursorSpan.style.backgroundColor = this.mode.isPreviewing()
      ? "rgba(255, 160, 0, 0.6)"
      : "blue";
    this.cursorSpan.style.color = "white";
    this.cursorSpan.textContent = lineText.charAt(col) || " ";
  }
}

export const createFullEditor = (
  container: HTMLDivElement,
  options?: Omit<RegionHistoryControllerOptions, "dom"> & {
    initialContent?: string;
  },
): { controller: RegionHistoryController; dom: EditorDom } => {
  const dom = initializeEditorDom(container, options?.initialContent ?? "");
  const controller = new RegionHistoryController({ ...options, dom });
  return { controller, dom };
};
