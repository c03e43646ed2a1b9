import type { SelectionAdapter } from "./types";
import { clampNumber } from "./utils";

export class SelectionState implements SelectionAdapter {
  private point: number;
  private mark: number | null = null;
  private active = false;

  constructor(
    private buffer: { getLength(): number },
    point = 0,
  ) {
    this.point = this.clamp(point);
  }

  public isSelectionActive(): boolean {
    return this.active;
  }

  public getPoint(): number {
    return this.point;
  }

  public getMark(): number | null {
    return this.mark;
  }

  public clearSelection(): void {
    this.active = false;
  }

  public setSelection(point: number, mark: number): void {
    this.mark = this.clamp(mark);
    this.point = this.clamp(point);
    this.active = true;
  }

  public movePoint(offset: number): void {
    this.point = this.clamp(offset);
  }

  public moveBy(delta: number): void {
    this.movePoint(this.point + delta);
  }

  public setMark(): void {
    this.mark = this.point;
    this.active = true;
  }

  public exchangePointAndMark(): void {
    if (this.mark === null) return;
    const mark = this.mark;
    this.mark = this.point;
    this.point = mark;
    this.active = true;
  }

  public clampToBuffer(): void {
    this.point = this.clamp(this.point);
    if (this.mark !== null) this.mark = this.clamp(this.mark);
  }

  private clamp(offset: number): number {
    return clampNumber(offset, 0, this.buffer.getLength());
  }
}
