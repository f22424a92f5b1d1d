/**
 * Media Types
 * 
 * Track and container facts as reported by ffprobe.
 */

export type TrackKind = 'video' | 'audio' | 'subtitle';

export const TRACK_KINDS: readonly TrackKind[] = ['video', 'audio', 'subtitle'];

export interface Track {
  readonly index: number;
  readonly kind: TrackKind;
  readonly codec: string;
  /** Coded height; only reported for video tracks */
  readonly scanlineCount?: number;
  /** At most four characters, e.g. `eng` */
  readonly language?: string;
  readonly title?: string;
}

export interface ProbeResult {
  readonly tracks: readonly Track[];
  readonly title?: string;
  /** Seconds, 0 when unknown */
  readonly duration: number;
  /** Overall `bit_rate` as reported, 0 when unknown */
  readonly bitrate: number;
}

export interface ClassifiedTracks {
  video: Track[];
  audio: Track[];
  subtitle: Track[];
}
