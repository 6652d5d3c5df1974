import { z } from 'zod';

/**
 * A song whose file is available on local storage. Keyed by the song id.
 */
export const OfflineSongSchema = z.object({
  id: z.string().min(1),
  songName: z.string(),
  artist: z.string(),
  albumName: z.string().optional(),
  localPath: z.string().min(1),
  originalUrl: z.string(),
  duration: z.number().nonnegative().optional(),
  downloadDate: z.string().datetime(),
  fileSize: z.number().int().nonnegative().optional(),
});

export type OfflineSong = Readonly<z.infer<typeof OfflineSongSchema>>;
