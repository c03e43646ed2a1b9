import type { Region } from "./types";
import { InvalidCursorError } from "./errors";
import { createRegion, isDegenerate, regionsEqual } from "./region";
import { wrapIndex } from "./utils";

export const DEFAULT_CAPACITY = 10;

export const assertCapacity = (capacity: number): void => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(
      `Region history capacity must be a positive integer, got ${capacity}`,
    );
  }
};

/** Offset 0 is the newest region, -1 the oldest. */
export class RegionHistory {
  private slots: Array<Region | undefined>;
  private base = 0;
  private count = 0;

  constructor(capacity = DEFAULT_CAPACITY) {
    assertCapacity(capacity);
    this.slots = new Array<Region | undefined>(capacity).fill(undefined);
  }

  public get capacity(): number {
    return this.slots.length;
  }

  public size(): number {
    return this.count;
  }

  public isEmpty(): boolean {
    return this.count === 0;
  }

  public latest(offset = 0): Region {
    if (this.count === 0) throw new InvalidCursorError(offset);
    const index = wrapIndex(offset, this.count);
    const region = this.slots[(this.base + index) % this.capacity];
    if (!region) throw new InvalidCursorError(offset);
    return region;
  }

  public record(region: Region): boolean {
    if (isDegenerate(region)) return false;
    if (this.count > 0) {
      if (regionsEqual(region, this.latest(0))) return false;
      if (regionsEqual(region, this.latest(-1))) return false;
    }
    this.push(createRegion(region.point, region.mark));
    return true;
  }

  public toArray(): Region[] {
    const regions: Region[] = [];
    for (let offset = 0; offset < this.count; offset += 1) {
      regions.push(this.latest(offset));
    }
    return regions;
  }

  public clear(): void {
    this.slots.fill(undefined);
    this.base = 0;
    this.count = 0;
  }

  public setCapacity(capacity: number): void {
    assertCapacity(capacity);
    const kept = this.toArray().slice(0, capacity);
    this.slots = new Array<Region | undefined>(capacity).fill(undefined);
    kept.forEach((region, index) => {
      this.slots[index] = region;
    });
    this.base = 0;
    this.count = kept.length;
  }

  private push(region: Region): void {
    this.base = wrapIndex(this.base - 1, this.capacity);
    this.slots[this.base] = region;
    if (this.count < this.capacity) this.count += 1;
  }
}
