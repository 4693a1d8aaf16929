/**
 * message-utils.ts — Turn an assistant reply into Discord messages.
 */

export const DISCORD_MAX_LEN = 2000;

/** Remove file_search citation markers such as `【4:0†faq.json】`. */
export function stripCitations(text: string): string {
  return text.replace(/【[^】]*】/g, "");
}

/**
 * Split a long message into chunks of at most `limit` characters, breaking
 * at a newline, else a space, in the second half of the window, else hard.
 */
export function splitMessage(text: string, limit: number = DISCORD_MAX_LEN): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > limit) {
    let splitAt = remaining.lastIndexOf("\n", limit);
    if (splitAt < limit / 2) {
      splitAt = remaining.lastIndexOf(" ", limit);
    }
    if (splitAt < limit / 2) {
      splitAt = limit;
    }

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).replace(/^\s+/, "");
  }
  if (remaining.length > 0) chunks.push(remaining);

  return chunks;
}

/** Citation-free chunks ready to send; empty when nothing is left to say. */
export function formatReply(text: string): string[] {
  const clean = stripCitations(text).trim();
  if (!clean) return [];
  return splitMessage(clean);
}
