import type {
  HighlightAdapter,
  PreviewKeys,
  Region,
  SelectionAdapter,
  TransientBindingsAdapter,
} from "./types";
import type { RegionHistory } from "./region-history";
import { EmptyHistoryError, SessionAlreadyActiveError } from "./errors";
import { SelectionTracker } from "./selection-tracker";
import {
  createPreviewHooks,
  DEFAULT_PREVIEW_KEYS,
  PreviewSession,
  type PreviewHooks,
} from "./preview-session";
import { debugLog } from "./debug";

export interface RegionHistoryModeOptions<THandle> {
  selection: SelectionAdapter;
  highlighter: HighlightAdapter<THandle>;
  bindings: TransientBindingsAdapter;
  capacity?: number;
  showUsageHint?: boolean;
  keys?: Partial<PreviewKeys>;
  notify?: (message: string) => void;
}

export class RegionHistoryMode<THandle> {
  public readonly hooks: PreviewHooks = createPreviewHooks();

  private tracker: SelectionTracker;
  private session: PreviewSession<THandle> | null = null;
  private selection: SelectionAdapter;
  private highlighter: HighlightAdapter<THandle>;
  private bindings: TransientBindingsAdapter;
  private showUsageHint: boolean;
  private keys: PreviewKeys;
  private notify: ((message: string) => void) | undefined;

  constructor(options: RegionHistoryModeOptions<THandle>) {
    const { capacity, showUsageHint = true, keys = {} } = options;
    this.selection = options.selection;
    this.highlighter = options.highlighter;
    this.bindings = options.bindings;
    this.showUsageHint = showUsageHint;
    this.keys = { ...DEFAULT_PREVIEW_KEYS, ...keys };
    this.notify = options.notify;
    this.tracker = new SelectionTracker(this.selection, { capacity });
  }

  public getHistory(): RegionHistory | null {
    return this.tracker.getHistory();
  }

  public getSession(): PreviewSession<THandle> | null {
    return this.session;
  }

  public isPreviewing(): boolean {
    return this.session?.getState() === "previewing";
  }

  public setCapacity(capacity: number): void {
    this.tracker.setCapacity(capacity);
  }

  public beforeCommand(): void {
    this.tracker.beforeCommand();
  }

  public afterCommand(): Region | null {
    return this.tracker.afterCommand();
  }

  public startPreview(): PreviewSession<THandle> {
    if (this.isPreviewing()) throw new SessionAlreadyActiveError();
    const history = this.tracker.getHistory();
    if (!history || history.isEmpty()) throw new EmptyHistoryError();

    const session = new PreviewSession<THandle>({
      history,
      selection: this.selection,
      highlighter: this.highlighter,
      bindings: this.bindings,
      keys: this.keys,
      hooks: this.hooks,
      showUsageHint: this.showUsageHint,
      notify: this.notify,
    });
    session.start();
    this.session = session;
    // start() deactivates the selection itself; that is not a capture.
    this.tracker.forgetActiveSelection();
    debugLog("RegionHistoryMode", `previewing ${history.size()} regions`);
    return session;
  }
}
