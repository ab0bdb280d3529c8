/** Anything that can be turned into Mermaid notation. */
export interface Renderable {
  render(): string;
}

export const DEFAULT_INDENT = 4;

export function render(item: Renderable): string {
  return item.render();
}

function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split('\n');
  // A trailing newline ends the last line rather than opening a new one.
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Prefix every line of `text` with `size` spaces. Lines are rejoined with `\n`
 * and no line is added or removed.
 */
export function indent(text: string, size: number = DEFAULT_INDENT): string {
  const padding = ' '.repeat(size);
  return splitLines(text)
    .map((line) => `${padding}${line}`)
    .join('\n');
}

/**
 * Append a `%% <title> start` / `%% <title> end` banner section holding the
 * rendered items. Empty collections leave `lines` untouched.
 */
export function appendSection(
  lines: string[],
  title: string,
  items: Iterable<Renderable>,
  size: number = DEFAULT_INDENT,
): string[] {
  const rendered = Array.from(items, (item) => indent(item.render(), size));
  if (rendered.length === 0) return lines;
  lines.push(indent(`%% ${title} start`, size));
  lines.push(...rendered);
  lines.push(indent(`%% ${title} end`, size));
  return lines;
}

export interface DocumentSection {
  title: string;
  items: Iterable<Renderable>;
}

export function renderDocument(header: string, sections: DocumentSection[]): string {
  const lines = [header];
  sections.forEach((section) => appendSection(lines, section.title, section.items));
  return lines.join('\n');
}
