export function splitList(value: string | undefined | null): string[] {
  return (value ?? '')
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export function containsAny(text: string, needles: readonly string[]): boolean {
  return needles.some(needle => text.includes(needle.toLowerCase()));
}
