export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-word (or whole-phrase) match.
 */
export function containsKeyword(text: string, keyword: string): boolean {
  return new RegExp(`(^|[^\\p{L}\\p{N}'])${escapeRegExp(keyword)}($|[^\\p{L}\\p{N}'])`, "iu").test(
    text,
  );
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}

/**
 * Removes the head of `next` that repeats the tail of `previous`, looking at
 * most `maxOverlap` characters back. The repeated part must end on a word
 * boundary of `next`.
 */
export function stripOverlap(previous: string, next: string, maxOverlap: number): string {
  for (let length = Math.min(maxOverlap, previous.length, next.length); length > 0; length -= 1) {
    const tail = previous.slice(-length);
    const following = next.charAt(length);
    if (next.startsWith(tail) && (following === "" || /\s/.test(following))) {
      return next.slice(length).trimStart();
    }
  }
  return next;
}
