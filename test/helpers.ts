import type {
  HighlightAdapter,
  TransientBinding,
  TransientBindingsAdapter,
} from "../src";
import { createRegion, RegionHistory, SelectionState } from "../src";

export interface FakeHighlight {
  id: number;
  start: number;
  end: number;
  destroyed: boolean;
}

export class FakeHighlighter implements HighlightAdapter<FakeHighlight> {
  public created: FakeHighlight[] = [];
  public moves = 0;

  public createHighlight(start: number, end: number): FakeHighlight {
    const highlight = {
      id: this.created.length,
      start,
      end,
      destroyed: false,
    };
    this.created.push(highlight);
    return highlight;
  }

  public moveHighlight(handle: FakeHighlight, start: number, end: number) {
    handle.start = start;
    handle.end = end;
    this.moves += 1;
  }

  public destroyHighlight(handle: FakeHighlight): void {
    if (handle.destroyed) throw new Error("highlight destroyed twice");
    handle.destroyed = true;
  }

  public live(): FakeHighlight[] {
    return this.created.filter((highlight) => !highlight.destroyed);
  }
}

export class FakeBindings implements TransientBindingsAdapter {
  public bindings: ReadonlyMap<string, TransientBinding> | null = null;
  public keep: ((commandId: string) => boolean) | null = null;
  public onExit: (() => void) | null = null;

  public installTransientBindings(
    bindings: ReadonlyMap<string, TransientBinding>,
    keep: (commandId: string) => boolean,
    onExit: () => void,
  ): () => void {
    this.bindings = bindings;
    this.keep = keep;
    this.onExit = onExit;
    return () => {
      this.bindings = null;
    };
  }
}

export const makeSelection = (length = 100, point = 0): SelectionState => {
  return new SelectionState({ getLength: () => length }, point);
};

export const makeHistory = (
  pairs: [number, number][],
  capacity = 10,
): RegionHistory => {
  const history = new RegionHistory(capacity);
  for (const [point, mark] of [...pairs].reverse()) {
    history.record(createRegion(point, mark));
  }
  return history;
};
