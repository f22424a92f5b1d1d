/**
 * Processing Types
 * 
 * The transcode plan handed to the ffmpeg command builder, and the custom
 * media manifest describing its outputs.
 */

import type { TrackKind } from '@remuxer/media';
import type { AudioEncoder, SubtitleEncoder, VideoEncoder } from './compatibility.js';

export type StreamAction =
  | { type: 'copy'; experimental?: boolean }
  | { type: 'encode'; codec: VideoEncoder | AudioEncoder | SubtitleEncoder; channels?: number };

export interface StreamOperation {
  trackIndex: number;
  kind: TrackKind;
  /** ffmpeg stream selector, `0:<index>` */
  mapping: string;
  action: StreamAction;
  /** File name relative to the output directory */
  output: string;
}

export interface OutputFile {
  name: string;
  /** Forced ffmpeg muxer */
  format?: string;
}

export type SkipReason = 'unsupported-codec' | 'bitmap-subtitle' | 'secondary-video';

export interface SkippedTrack {
  trackIndex: number;
  kind: TrackKind;
  codec: string;
  reason: SkipReason;
}

// Manifest shapes. Keys are serialized as-is.

export interface ManifestSource {
  url: string;
  contentType: string;
  quality: number;
  bitrate: number;
}

export interface ManifestAudioTrack {
  url: string;
  label: string;
  language: string;
  contentType: string;
}

export interface ManifestTextTrack {
  url: string;
  name: string;
  contentType: string;
}

export interface CustomManifest {
  title: string;
  duration: number;
  sources: ManifestSource[];
  audioTracks: ManifestAudioTrack[];
  textTracks: ManifestTextTrack[];
}

export interface RemuxPlan {
  operations: StreamOperation[];
  /** Distinct outputs in the order they are first written */
  outputs: OutputFile[];
  skipped: SkippedTrack[];
  manifest: CustomManifest;
}

export type QualityMode = 'exact' | 'snap' | 'strict';

export const QUALITY_MODES: readonly QualityMode[] = ['exact', 'snap', 'strict'];

export interface PlanOptions {
  inputFile: string;
  /** Prepended verbatim to every output file name */
  urlPrefix: string;
  preferredLanguage?: string;
  qualityMode?: QualityMode;
  /** Emit the video source even when the file has no audio */
  videoOnlySource?: boolean;
  title?: string;
}
