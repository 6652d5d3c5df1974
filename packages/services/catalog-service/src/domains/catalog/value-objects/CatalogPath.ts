/**
 * Remote catalog layout: `Artist/<artist>/<album>/<file>`.
 */

export const CATALOG_ROOT = 'Artist/';

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp'];

export function artistPath(artist: string): string {
  return `${CATALOG_ROOT}${artist}/`;
}

export function albumPath(artist: string, albumName: string): string {
  return `${artistPath(artist)}${albumName}/`;
}

/**
 * Last non-empty segment of a slash-delimited path: `Artist/Foo/Bar/` -> `Bar`.
 */
export function lastSegment(path: string): string {
  const segments = path.split('/').filter(segment => segment.length > 0);
  return segments[segments.length - 1] ?? '';
}

export function isImageFile(path: string): boolean {
  const lower = path.toLowerCase();
  return IMAGE_EXTENSIONS.some(extension => lower.endsWith(extension));
}
