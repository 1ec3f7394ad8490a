const ELLIPSIS = "…";

/** Length in code points, so multi-unit characters count once. */
export function textLength(text: string): number {
  return Array.from(text).length;
}

/** Cut to at most `width` code points, marking the cut with an ellipsis. */
export function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  if (width < 2) return chars.slice(0, width).join("");
  return chars.slice(0, width - 1).join("").trimEnd() + ELLIPSIS;
}

/** Truncate or right-pad to exactly `width` code points. */
export function fitLabel(text: string, width: number): string {
  const cut = truncate(text, width);
  return cut + " ".repeat(Math.max(0, width - textLength(cut)));
}
