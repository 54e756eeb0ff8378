/**
 * Strip emphasis and table markup from raw model output and convert line
 * breaks to the `<br>` markers the chat page renders.
 */
export function sanitizeResponse(raw: string): string {
  return raw.replace(/\*/g, '').replace(/\|/g, '').replace(/\n/g, '<br>');
}
