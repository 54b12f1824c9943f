const FENCED_BLOCK = /^```[^\n]*\n([\s\S]*?)\n?```\s*$/;

/**
 * Chat models often wrap a returned file in a single Markdown code fence.
 * When the whole reply is one fenced block, returns its body; otherwise the
 * reply is returned untouched.
 */
export function unwrapCodeFence(text: string): string {
  const match = FENCED_BLOCK.exec(text.trim());
  if (!match) return text;
  return `${match[1]}\n`;
}
