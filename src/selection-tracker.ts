import type { Region, SelectionAdapter } from "./types";
import { RegionHistory, assertCapacity, DEFAULT_CAPACITY } from "./region-history";
import { createRegion, isDegenerate } from "./region";
import { debugLog } from "./debug";

export class SelectionTracker {
  private regionWasActive = false;
  private history: RegionHistory | null = null;
  private capacity: number;

  constructor(
    private selection: SelectionAdapter,
    { capacity = DEFAULT_CAPACITY }: { capacity?: number } = {},
  ) {
    assertCapacity(capacity);
    this.capacity = capacity;
  }

  public getHistory(): RegionHistory | null {
    return this.history;
  }

  public setCapacity(capacity: number): void {
    assertCapacity(capacity);
    this.capacity = capacity;
    this.history?.setCapacity(capacity);
  }

  public beforeCommand(): void {
    this.regionWasActive = this.selection.isSelectionActive();
  }

  public afterCommand(): Region | null {
    const wasActive = this.regionWasActive;
    this.regionWasActive = false;
    if (!wasActive || this.selection.isSelectionActive()) return null;

    const mark = this.selection.getMark();
    if (mark === null) return null;

    const region = createRegion(this.selection.getPoint(), mark);
    if (isDegenerate(region)) return null;

    this.history ??= new RegionHistory(this.capacity);
    if (!this.history.record(region)) return null;
    debugLog("SelectionTracker", "recorded", region);
    return region;
  }

  public forgetActiveSelection(): void {
    this.regionWasActive = false;
  }
}
