import type { Cheerio } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';

/**
 * Collapse runs of whitespace (including newlines from markup) to one space
 */
export function cleanText(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Text content with a space between text nodes, so `Keynote:<br>Jane`
 * reads "Keynote: Jane" rather than "Keynote:Jane"
 */
export function nodeText<T extends AnyNode>(selection: Cheerio<T>): string {
  const parts: string[] = [];
  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      parts.push(node.data);
    } else if (hasChildren(node)) {
      node.children.forEach(walk);
    }
  };
  selection.toArray().forEach(walk);
  return cleanText(parts.join(' '));
}
