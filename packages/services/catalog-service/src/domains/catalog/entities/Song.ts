/**
 * Song Domain Entity
 * Immutable leaf of an album; a re-fetch produces a new instance rather than mutating this one.
 */

import { z } from 'zod';

export const SongSnapshotSchema = z.object({
  id: z.string().min(1),
  songName: z.string(),
  artist: z.string(),
  albumName: z.string().optional(),
  songUrl: z.string(),
  duration: z.number().nonnegative().optional(),
});

export type SongSnapshot = z.infer<typeof SongSnapshotSchema>;

export interface SongData {
  id?: string;
  songName: string;
  artist: string;
  albumName?: string;
  songUrl: string;
  duration?: number;
}

export class Song {
  private constructor(
    readonly id: string,
    readonly songName: string,
    readonly artist: string,
    readonly albumName: string | undefined,
    readonly songUrl: string,
    readonly duration: number | undefined
  ) {}

  static create(data: SongData): Song {
    const id = data.id ?? Song.deriveId(data.artist, data.albumName ?? '', data.songName);
    return new Song(id, data.songName, data.artist, data.albumName, data.songUrl, data.duration);
  }

  static fromSnapshot(snapshot: SongSnapshot): Song {
    return Song.create(snapshot);
  }

  /**
   * Server-derived identity: `${artist}_${album}_${fileName}`.
   */
  static deriveId(artist: string, albumName: string, fileName: string): string {
    return `${artist}_${albumName}_${fileName}`;
  }

  matches(query: string): boolean {
    const needle = query.toLowerCase();
    return this.songName.toLowerCase().includes(needle) || this.artist.toLowerCase().includes(needle);
  }

  toJSON(): SongSnapshot {
    return {
      id: this.id,
      songName: this.songName,
      artist: this.artist,
      ...(this.albumName !== undefined && { albumName: this.albumName }),
      songUrl: this.songUrl,
      ...(this.duration !== undefined && { duration: this.duration }),
    };
  }
}
