import type { HighlightAdapter, SelectionSegment, TextBuffer } from "./types";

export const PREVIEW_HIGHLIGHT_COLOR = "rgba(255, 200, 0, 0.35)";

/**
 * Splits `[start, end)` into one segment per row. A segment that runs past
 * the end of its line includes one column for the newline.
 */
export const calculateSegments = (
  buffer: TextBuffer,
  start: number,
  end: number,
): SelectionSegment[] => {
  if (end <= start) return [];
  const from = buffer.offsetToPosition(start);
  const to = buffer.offsetToPosition(end);
  if (from.row === to.row) {
    return [{ row: from.row, startCol: from.col, endCol: to.col }];
  }

  const segments: SelectionSegment[] = [
    {
      row: from.row,
      startCol: from.col,
      endCol: buffer.getLineLength(from.row) + 1,
    },
  ];
  for (let row = from.row + 1; row < to.row; row += 1) {
    segments.push({ row, startCol: 0, endCol: buffer.getLineLength(row) + 1 });
  }
  if (to.col > 0) {
    segments.push({ row: to.row, startCol: 0, endCol: to.col });
  }
  return segments;
};

export const renderSegments = (
  target: HTMLElement,
  segments: SelectionSegment[],
  color: string,
): void => {
  const document = target.ownerDocument;
  target.replaceChildren();
  for (const segment of segments) {
    const block = document.createElement("div");
    block.style.position = "absolute";
    block.style.top = `${segment.row}em`;
    block.style.left = `${segment.startCol}ch`;
    block.style.width = `${Math.max(1, segment.endCol - segment.startCol)}ch`;
    block.style.height = "1em";
    block.style.backgroundColor = color;
    block.style.pointerEvents = "none";
    target.appendChild(block);
  }
};

export class DomHighlighter implements HighlightAdapter<HTMLDivElement> {
  constructor(
    private overlay: HTMLDivElement,
    private buffer: TextBuffer,
    private color = PREVIEW_HIGHLIGHT_COLOR,
  ) {}

  public createHighlight(start: number, end: number): HTMLDivElement {
    const group = this.overlay.ownerDocument.createElement("div");
    this.overlay.appendChild(group);
    this.draw(group, start, end);
    return group;
  }

  public moveHighlight(handle: HTMLDivElement, start: number, end: number) {
    this.draw(handle, start, end);
  }

  public destroyHighlight(handle: HTMLDivElement): void {
    handle.remove();
  }

  private draw(group: HTMLDivElement, start: number, end: number): void {
    renderSegments(
      group,
      calculateSegments(this.buffer, start, end),
      this.color,
    );
  }
}
