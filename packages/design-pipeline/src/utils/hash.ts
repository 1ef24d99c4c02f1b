export function fnv1a(str: string): string {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
  }
  return h.toString(36);
}

/** Stable placeholder id for an image source; the image itself is never fetched. */
export function imageHashFor(src: string): string {
  return `image-${fnv1a(src)}`;
}
