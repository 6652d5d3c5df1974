/**
 * `{song}_{artist}` lower-cased, non-word characters dropped, whitespace runs as `_`, `.mp3` suffix.
 */
export function buildOfflineFileName(songName: string, artist: string): string {
  const base = `${songName}_${artist}`
    .replace(/[^\w\s-]/g, '')
    .replace(/\s+/g, '_')
    .toLowerCase();
  return `${base}.mp3`;
}
