/** Tried in order; the first match wins. */
const RESOURCE_ID_PATTERNS: readonly RegExp[] = [
  /youtube\.com\/watch\?(?:[^#]*&)?v=([A-Za-z0-9_-]{11})/,
  /youtu\.be\/([A-Za-z0-9_-]{11})/,
  /youtube\.com\/embed\/([A-Za-z0-9_-]{11})/,
  /youtube\.com\/v\/([A-Za-z0-9_-]{11})/,
];

export function extractResourceId(url: string): string | undefined {
  for (const pattern of RESOURCE_ID_PATTERNS) {
    const id = pattern.exec(url)?.[1];
    if (id) {
      return id;
    }
  }
  return undefined;
}

export const watchUrl = (id: string): string => `https://www.youtube.com/watch?v=${id}`;

export const thumbnailUrl = (id: string): string => `https://img.youtube.com/vi/${id}/maxresdefault.jpg`;
