/**
 * Compatibility Model
 * 
 * Which containers the player accepts, and which codecs may be copied into
 * them as-is. Every lookup is total: an unknown codec yields undefined.
 * 
 * REMEMBER: Prefer stream copy when possible!
 */

export type VideoContainer = 'mp4' | 'webm' | 'ogg';

/**
 * `pseudo-m4a` is a plain MP4 holding only audio, named `.m4a`. The M4A
 * muxer refuses anything but AAC/ALAC, while the player only looks at the
 * declared type, so MP3 goes in this way.
 */
export type AudioContainer = 'm4a' | 'ogg' | 'pseudo-m4a';

export type AudioEncoder = 'aac' | 'libopus';
export type VideoEncoder = 'libsvtav1';
export type SubtitleEncoder = 'webvtt';

export interface VideoContainerInfo {
  acceptedAudioCodecs: readonly string[];
  preferredAudioEncoder: AudioEncoder;
  extension: string;
  mimeType: string;
}

export interface AudioContainerInfo {
  extension: string;
  mimeType: string;
  /** ffmpeg muxer to force; the extension picks it otherwise */
  muxer?: string;
}

export const VIDEO_CONTAINERS: Readonly<Record<VideoContainer, VideoContainerInfo>> = Object.freeze({
  mp4: {
    acceptedAudioCodecs: ['aac', 'alac', 'flac', 'opus', 'mp3'],
    preferredAudioEncoder: 'aac',
    extension: 'mp4',
    mimeType: 'video/mp4',
  },
  webm: {
    acceptedAudioCodecs: ['opus', 'vorbis'],
    preferredAudioEncoder: 'libopus',
    extension: 'webm',
    mimeType: 'video/webm',
  },
  ogg: {
    acceptedAudioCodecs: ['opus', 'vorbis', 'flac'],
    preferredAudioEncoder: 'libopus',
    extension: 'ogv',
    mimeType: 'video/ogg',
  },
});

export const AUDIO_CONTAINERS: Readonly<Record<AudioContainer, AudioContainerInfo>> = Object.freeze({
  'm4a': { extension: 'm4a', mimeType: 'audio/mp4' },
  'ogg': { extension: 'ogg', mimeType: 'audio/ogg' },
  'pseudo-m4a': { extension: 'm4a', mimeType: 'audio/mp4', muxer: 'mp4' },
});

const VIDEO_CODEC_CONTAINERS: ReadonlyMap<string, VideoContainer> = new Map<string, VideoContainer>([
  ['av1', 'webm'],
  ['vp8', 'webm'],
  ['vp9', 'webm'],
  ['h264', 'mp4'],
  ['hevc', 'mp4'],
  ['mpeg4', 'mp4'], // MPEG-4 Part 2
  ['mpeg2video', 'mp4'],
  ['theora', 'ogg'],
]);

// FLAC can't be declared as a bare file, but Ogg carries it fine
const AUDIO_CODEC_CONTAINERS: ReadonlyMap<string, AudioContainer> = new Map<string, AudioContainer>([
  ['aac', 'm4a'],
  ['alac', 'm4a'],
  ['aac_latm', 'm4a'],
  ['opus', 'ogg'],
  ['vorbis', 'ogg'],
  ['flac', 'ogg'],
  ['mp3', 'pseudo-m4a'],
]);

/**
 * Image-based subtitles; converting them to text would need OCR.
 */
export const BITMAP_SUBTITLE_CODECS: ReadonlySet<string> = new Set([
  'dvb_subtitle',
  'dvd_subtitle',
  'hdmv_pgs_subtitle',
  'xsub',
]);

export interface SubtitleOutput {
  encoder: SubtitleEncoder;
  extension: string;
  mimeType: string;
}

export interface FallbackEncoding {
  container: VideoContainer;
  videoEncoder: VideoEncoder;
  audioEncoder: AudioEncoder;
}

export const SUBTITLE_OUTPUT: Readonly<SubtitleOutput> = Object.freeze({
  encoder: 'webvtt',
  extension: 'vtt',
  mimeType: 'text/vtt',
});

/**
 * Used when the video codec fits no container: AV1 + Opus in WebM
 * plays everywhere the player does.
 */
export const FALLBACK_ENCODING: Readonly<FallbackEncoding> = Object.freeze({
  container: 'webm',
  videoEncoder: 'libsvtav1',
  audioEncoder: 'libopus',
});

// Re-encoded audio is downmixed to stereo to keep the encode cheap
export const ENCODE_CHANNELS = 2;

export const ACCEPTED_QUALITIES: readonly number[] = Object.freeze([240, 360, 480, 540, 720, 1080, 1440, 2160]);

export function findVideoContainer(videoCodec: string): VideoContainer | undefined {
  return VIDEO_CODEC_CONTAINERS.get(videoCodec);
}

export function findAudioContainer(audioCodec: string): AudioContainer | undefined {
  return AUDIO_CODEC_CONTAINERS.get(audioCodec);
}

export function acceptsAudioCodec(container: VideoContainer, audioCodec: string): boolean {
  return VIDEO_CONTAINERS[container].acceptedAudioCodecs.includes(audioCodec);
}

/**
 * ffmpeg treats FLAC in MP4 as experimental and refuses it without `-strict experimental`.
 */
export function requiresExperimentalMux(container: VideoContainer, audioCodec: string): boolean {
  return container === 'mp4' && audioCodec === 'flac';
}

export function isBitmapSubtitle(codec: string): boolean {
  return BITMAP_SUBTITLE_CODECS.has(codec);
}
