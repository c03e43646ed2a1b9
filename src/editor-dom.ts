import { EditorBuffer } from "./editor-buffer";

export interface EditorDom {
  root: HTMLDivElement;
  buffer: EditorBuffer;
  selectionOverlay: HTMLDivElement;
  highlightOverlay: HTMLDivElement;
  cursorSpan: HTMLSpanElement;
}

const makeOverlay = (document: Document, zIndex: string): HTMLDivElement => {
  const overlay = document.createElement("div");
  overlay.style.position = "absolute";
  overlay.style.top = "0";
  overlay.style.left = "0";
  overlay.style.right = "0";
  overlay.style.bottom = "0";
  overlay.style.pointerEvents = "none";
  overlay.style.zIndex = zIndex;
  return overlay;
};

export const initializeEditorDom = (
  container: HTMLDivElement,
  initialContent = "",
): EditorDom => {
  const document = container.ownerDocument;
  const root = container.appendChild(document.createElement("div"));
  root.style.position = "relative";

  const buffer = new EditorBuffer(document, root, initialContent);

  const selectionOverlay = root.appendChild(makeOverlay(document, "0"));
  const highlightOverlay = root.appendChild(makeOverlay(document, "0"));

  const cursorSpan = root.appendChild(document.createElement("span"));
  cursorSpan.style.position = "absolute";
  cursorSpan.style.width = "1ch";
  cursorSpan.style.height = "1em";
  cursorSpan.style.zIndex = "2";

  return { root, buffer, selectionOverlay, highlightOverlay, cursorSpan };
};
