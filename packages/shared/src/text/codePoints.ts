/** Counts code points, so a surrogate pair is one character. */
export const codePointLength = (text: string): number => Array.from(text).length;

/** Keeps the first `limit` code points; never splits a surrogate pair. */
export const sliceCodePoints = (text: string, limit: number): string => {
  if (text.length <= limit) return text;
  let end = 0;
  let taken = 0;
  for (const char of text) {
    if (taken === limit) break;
    end += char.length;
    taken += 1;
  }
  return text.slice(0, end);
};
