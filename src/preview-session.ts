import type {
  HighlightAdapter,
  PreviewKeys,
  PreviewOutcome,
  PreviewState,
  Region,
  SavedSelection,
  SelectionAdapter,
  TransientBinding,
  TransientBindingsAdapter,
} from "./types";
import type { RegionHistory } from "./region-history";
import {
  EmptyHistoryError,
  InvalidCursorError,
  PreviewEndedError,
  PreviewInactiveError,
  SessionAlreadyActiveError,
} from "./errors";
import { HookList } from "./hook-list";
import { regionBounds } from "./region";
import { debugLog } from "./debug";
import { wrapIndex } from "./utils";

export const PREVIEW_COMMANDS = {
  backward: "region-history-backward",
  forward: "region-history-forward",
  activate: "region-history-activate",
  quit: "region-history-quit",
} as const;

const previewCommandIds = new Set<string>(Object.values(PREVIEW_COMMANDS));

export const DEFAULT_PREVIEW_KEYS: PreviewKeys = {
  backward: "ArrowUp",
  forward: "ArrowDown",
  activate: "Enter",
  quit: "Escape",
};

export interface PreviewHooks {
  beforePreviewStart: HookList<[]>;
  afterPreviewEnd: HookList<[PreviewOutcome]>;
}

export const createPreviewHooks = (): PreviewHooks => ({
  beforePreviewStart: new HookList<[]>(),
  afterPreviewEnd: new HookList<[PreviewOutcome]>(),
});

export const formatUsageHint = (keys: PreviewKeys): string => {
  return `${keys.backward}/${keys.forward}: cycle regions, ${keys.activate}: select, ${keys.quit}: cancel`;
};

export interface PreviewSessionOptions<THandle> {
  history: RegionHistory;
  selection: SelectionAdapter;
  highlighter: HighlightAdapter<THandle>;
  bindings: TransientBindingsAdapter;
  keys?: PreviewKeys;
  hooks?: PreviewHooks;
  showUsageHint?: boolean;
  notify?: (message: string) => void;
}

interface LivePreview<THandle> {
  saved: SavedSelection;
  highlight: { handle: THandle };
  removeBindings: () => void;
}

export class PreviewSession<THandle> {
  private state: PreviewState = "inactive";
  private cursorIndex = 0;
  private live: LivePreview<THandle> | null = null;
  private saved: SavedSelection | null = null;

  private history: RegionHistory;
  private selection: SelectionAdapter;
  private highlighter: HighlightAdapter<THandle>;
  private bindings: TransientBindingsAdapter;
  private keys: PreviewKeys;
  private hooks: PreviewHooks;
  private showUsageHint: boolean;
  private notify: (message: string) => void;

  constructor(options: PreviewSessionOptions<THandle>) {
    const {
      keys = DEFAULT_PREVIEW_KEYS,
      hooks = createPreviewHooks(),
      showUsageHint = true,
      notify = (message: string) => debugLog("PreviewSession", message),
    } = options;
    this.history = options.history;
    this.selection = options.selection;
    this.highlighter = options.highlighter;
    this.bindings = options.bindings;
    this.keys = keys;
    this.hooks = hooks;
    this.showUsageHint = showUsageHint;
    this.notify = notify;
  }

  public getState(): PreviewState {
    return this.state;
  }

  public getCursorIndex(): number {
    return this.cursorIndex;
  }

  public getSavedSelection(): SavedSelection | null {
    return this.saved ? { ...this.saved } : null;
  }

  public getRegion(): Region | null {
    if (!this.live || !this.isCursorValid()) return null;
    return this.history.latest(this.cursorIndex);
  }

  public keepsCommand(commandId: string): boolean {
    return this.live !== null && previewCommandIds.has(commandId);
  }

  public start(): Region {
    if (this.state === "previewing") throw new SessionAlreadyActiveError();
    if (this.state !== "inactive") throw new PreviewEndedError();
    if (this.history.isEmpty()) throw new EmptyHistoryError();
    this.hooks.beforePreviewStart.run();

    const saved: SavedSelection = {
      active: this.selection.isSelectionActive(),
      point: this.selection.getPoint(),
      mark: this.selection.getMark(),
    };
    const region = this.history.latest(0);
    const { start, end } = regionBounds(region);

    const acquired: Partial<Omit<LivePreview<THandle>, "saved">> = {};
    try {
      if (saved.active) this.selection.clearSelection();
      this.selection.movePoint(region.point);
      const highlight = { handle: this.highlighter.createHighlight(start, end) };
      acquired.highlight = highlight;
      const removeBindings = this.bindings.installTransientBindings(
        this.createBindings(),
        (commandId) => this.keepsCommand(commandId),
        () => this.quit(),
      );
      acquired.removeBindings = removeBindings;
      if (this.showUsageHint) this.notify(formatUsageHint(this.keys));
      this.live = { saved, highlight, removeBindings };
    } catch (error) {
      acquired.removeBindings?.();
      if (acquired.highlight) {
        this.highlighter.destroyHighlight(acquired.highlight.handle);
      }
      this.restoreSelection(saved);
      throw error;
    }

    this.cursorIndex = 0;
    this.saved = saved;
    this.state = "previewing";
    debugLog("PreviewSession", "started at", region);
    return region;
  }

  public advance(delta: number): Region {
    const live = this.requireLive();
    if (!Number.isInteger(delta)) {
      throw new RangeError(`Preview step must be an integer, got ${delta}`);
    }
    this.requireValidCursor(this.cursorIndex + delta);

    const index = wrapIndex(this.cursorIndex + delta, this.history.size());
    const region = this.history.latest(index);
    const { start, end } = regionBounds(region);
    const previousPoint = this.selection.getPoint();
    try {
      this.selection.movePoint(region.point);
      this.highlighter.moveHighlight(live.highlight.handle, start, end);
    } catch (error) {
      this.selection.movePoint(previousPoint);
      throw error;
    }
    this.cursorIndex = index;
    return region;
  }

  public backward(count = 1): Region {
    return this.advance(count);
  }

  public forward(count = 1): Region {
    return this.advance(-count);
  }

  public activate(): Region {
    this.requireLive();
    this.requireValidCursor(this.cursorIndex);
    const region = this.history.latest(this.cursorIndex);
    if (this.selection.isSelectionActive()) this.selection.clearSelection();
    this.selection.setSelection(region.point, region.mark);
    this.finish("activated");
    return region;
  }

  public quit(): void {
    this.finish("cancelled");
  }

  private finish(outcome: PreviewOutcome): void {
    const live = this.live;
    if (!live) return;
    this.live = null;
    this.state = outcome;
    live.removeBindings();
    this.highlighter.destroyHighlight(live.highlight.handle);
    if (outcome === "cancelled" && live.saved.active) {
      this.restoreSelection(live.saved);
    }
    debugLog("PreviewSession", outcome);
    this.hooks.afterPreviewEnd.run(outcome);
  }

  private restoreSelection(saved: SavedSelection): void {
    if (saved.active && saved.mark !== null) {
      this.selection.setSelection(saved.point, saved.mark);
    } else {
      this.selection.movePoint(saved.point);
    }
  }

  private isCursorValid(): boolean {
    return this.cursorIndex < this.history.size();
  }

  // The ring can shrink under a live preview.
  private requireValidCursor(offset: number): void {
    if (this.isCursorValid()) return;
    this.quit();
    throw new InvalidCursorError(offset);
  }

  private requireLive(): LivePreview<THandle> {
    if (!this.live) throw new PreviewInactiveError();
    return this.live;
  }

  private createBindings(): Map<string, TransientBinding> {
    const bindings = new Map<string, TransientBinding>();
    bindings.set(this.keys.backward, {
      id: PREVIEW_COMMANDS.backward,
      run: ({ count }) => {
        this.backward(count);
      },
    });
    bindings.set(this.keys.forward, {
      id: PREVIEW_COMMANDS.forward,
      run: ({ count }) => {
        this.forward(count);
      },
    });
    bindings.set(this.keys.activate, {
      id: PREVIEW_COMMANDS.activate,
      run: () => {
        this.activate();
      },
    });
    bindings.set(this.keys.quit, {
      id: PREVIEW_COMMANDS.quit,
      run: () => this.quit(),
    });
    return bindings;
  }
}
