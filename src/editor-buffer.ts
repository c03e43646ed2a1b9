import type { CursorPosition, TextBuffer } from "./types";
import { clampNumber } from "./utils";

export class EditorBuffer implements TextBuffer {
  private document: Document;
  private container: HTMLDivElement;
  private contentDiv: HTMLDivElement;

  constructor(document: Document, container: HTMLDivElement, content: string) {
    this.document = document;
    this.container = container;
    this.contentDiv = this.container.appendChild(
      this.document.createElement("div"),
    );
    this.contentDiv.style.position = "relative";
    this.contentDiv.style.zIndex = "1";
    this.replaceContent(content);
  }

  public extractContent(): string {
    const lines: string[] = [];
    for (const lineDiv of this.contentDiv.children) {
      lines.push(lineDiv.textContent ?? "");
    }
    return lines.join("\n");
  }

  public replaceContent(content: string): void {
    this.contentDiv.replaceChildren();
    for (const line of content.split("\n")) {
      this.contentDiv.appendChild(this.makeLineDiv(line));
    }
  }

  public getLength(): number {
    let length = 0;
    for (let row = 0; row < this.lineCount(); row += 1) {
      length += this.getLineLength(row);
    }
    return length + this.lineCount() - 1;
  }

  public lineCount(): number {
    return this.contentDiv.children.length;
  }

  public getLineText(row: number): string {
    return this.contentDiv.children[row]?.textContent ?? "";
  }

  public getLineLength(row: number): number {
    return this.getLineText(row).length;
  }

  public offsetToPosition(offset: number): CursorPosition {
    let remaining = clampNumber(offset, 0, this.getLength());
    const lastRow = this.lineCount() - 1;
    for (let row = 0; row < lastRow; row += 1) {
      const length = this.getLineLength(row);
      if (remaining <= length) return { row, col: remaining };
      remaining -= length + 1;
    }
    return { row: lastRow, col: remaining };
  }

  public positionToOffset({ row, col }: CursorPosition): number {
    const clampedRow = clampNumber(row, 0, this.lineCount() - 1);
    let offset = 0;
    for (let r = 0; r < clampedRow; r += 1) {
      offset += this.getLineLength(r) + 1;
    }
    return offset + clampNumber(col, 0, this.getLineLength(clampedRow));
  }

  private makeLineDiv(content: string): HTMLDivElement {
    const lineDiv = this.document.createElement("div");
    lineDiv.style.height = "1em";
    lineDiv.style.whiteSpace = "pre";
    lineDiv.textContent = content;
    return lineDiv;
  }
}
