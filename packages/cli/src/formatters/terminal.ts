import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

marked.use(markedTerminal());

/** Renders markdown with ANSI styling for a TTY. */
export function renderForTerminal(markdown: string): string {
  const output = marked(markdown, { async: false });
  // marked-terminal adds a trailing newline; trim for clean layout
  return typeof output === 'string' ? output.trimEnd() : markdown;
}
