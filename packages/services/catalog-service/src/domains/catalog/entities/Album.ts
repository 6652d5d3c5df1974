/**
 * Album Domain Entity
 * Aggregate root owning its tracks in remote listing order.
 */

import { z } from 'zod';
import { Song, SongSnapshotSchema } from './Song';

export const AlbumSnapshotSchema = z.object({
  id: z.string().min(1),
  albumName: z.string(),
  artist: z.string().optional(),
  albumCover: z.string().optional(),
  tracks: z.array(SongSnapshotSchema),
});

export type AlbumSnapshot = z.infer<typeof AlbumSnapshotSchema>;

export interface AlbumData {
  id?: string;
  albumName: string;
  artist?: string;
  albumCover?: string;
  tracks: readonly Song[];
}

export class Album {
  private constructor(
    readonly id: string,
    readonly albumName: string,
    readonly artist: string | undefined,
    readonly albumCover: string | undefined,
    readonly tracks: readonly Song[]
  ) {}

  static create(data: AlbumData): Album {
    const id = data.id ?? Album.deriveId(data.artist ?? '', data.albumName);
    return new Album(id, data.albumName, data.artist, data.albumCover, [...data.tracks]);
  }

  static fromSnapshot(snapshot: AlbumSnapshot): Album {
    return Album.create({
      ...snapshot,
      tracks: snapshot.tracks.map(track => Song.fromSnapshot(track)),
    });
  }

  static deriveId(artist: string, albumName: string): string {
    return `${artist}_${albumName}`;
  }

  get trackCount(): number {
    return this.tracks.length;
  }

  /**
   * Sum of known track durations in seconds; tracks without a duration count as zero.
   */
  get totalDuration(): number {
    return this.tracks.reduce((total, track) => total + (track.duration ?? 0), 0);
  }

  matches(query: string): boolean {
    const needle = query.toLowerCase();
    return this.albumName.toLowerCase().includes(needle) || (this.artist?.toLowerCase().includes(needle) ?? false);
  }

  findTrack(trackId: string): Song | undefined {
    return this.tracks.find(track => track.id === trackId);
  }

  toJSON(): AlbumSnapshot {
    return {
      id: this.id,
      albumName: this.albumName,
      ...(this.artist !== undefined && { artist: this.artist }),
      ...(this.albumCover !== undefined && { albumCover: this.albumCover }),
      tracks: this.tracks.map(track => track.toJSON()),
    };
  }
}
