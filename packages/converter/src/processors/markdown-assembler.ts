/** Separator written after every page fragment */
export const PAGE_SEPARATOR = '\n\n';

/**
 * A whole response wrapped in one fenced block: opening fence with an
 * optional language tag, body, closing fence.
 */
const FENCED_BLOCK_PATTERN = /^```[ \t]*([^\s`]*)[ \t]*\r?\n([\s\S]*?)\r?\n?[ \t]*```$/;

/**
 * Remove a fenced code block wrapped around the whole response.
 *
 * Only a fence whose language tag equals `language` (case-insensitive) is
 * removed; any other text is returned unchanged.
 *
 * @example
 * ```typescript
 * unwrapMarkdownFence('```markdown\n# Title\n```'); // '# Title'
 * unwrapMarkdownFence('# Title');                   // '# Title'
 * ```
 */
export function unwrapMarkdownFence(text: string, language = 'markdown'): string {
  const match = FENCED_BLOCK_PATTERN.exec(text.trim());
  if (!match || match[1].toLowerCase() !== language.toLowerCase()) {
    return text;
  }
  return match[2];
}

/**
 * Concatenate page fragments in order, each followed by a blank line.
 */
export function assembleMarkdown(fragments: readonly string[]): string {
  return fragments.map((fragment) => fragment + PAGE_SEPARATOR).join('');
}
