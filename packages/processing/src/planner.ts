/**
 * Remux Planner
 * 
 * Decides, per track, whether a stream can be copied into a container the
 * player accepts or has to be re-encoded, and describes the resulting files
 * in a custom media manifest. Pure: no I/O, nothing is executed here.
 * 
 * Outputs:
 * - main.<ext>                  first video track + best matching audio track
 * - audio_<index>_<lang>.<ext>  every other audio track that fits an audio container
 * - sub_<index>_<lang>.vtt      every text subtitle track
 */

import { MissingScanlineCountError, UnsupportedQualityError } from '@remuxer/core';
import { classifyTracks, type ProbeResult, type Track } from '@remuxer/media';
import { createLogger, getBasename } from '@remuxer/utils';
import {
  ACCEPTED_QUALITIES,
  AUDIO_CONTAINERS,
  ENCODE_CHANNELS,
  FALLBACK_ENCODING,
  SUBTITLE_OUTPUT,
  VIDEO_CONTAINERS,
  acceptsAudioCodec,
  findAudioContainer,
  findVideoContainer,
  isBitmapSubtitle,
  requiresExperimentalMux,
  type VideoContainer,
} from './compatibility.js';
import { buildLanguageLabel, manifestLanguage } from './languages.js';
import type {
  CustomManifest,
  ManifestAudioTrack,
  ManifestSource,
  ManifestTextTrack,
  OutputFile,
  PlanOptions,
  QualityMode,
  RemuxPlan,
  SkipReason,
  SkippedTrack,
  StreamAction,
  StreamOperation,
} from './types.js';

const log = createLogger({ component: 'planner' });

const UNKNOWN_LANGUAGE = 'unknown';

/**
 * One point for a codec the video's container takes (or when there is no
 * container, since everything gets re-encoded then), one for the preferred
 * language (or when none was asked for).
 */
export function scoreAudioTrack(
  track: Track,
  container: VideoContainer | undefined,
  preferredLanguage?: string
): number {
  let score = 0;
  if (!container || acceptsAudioCodec(container, track.codec)) {
    score += 1;
  }
  if (!preferredLanguage || track.language === preferredLanguage) {
    score += 1;
  }
  return score;
}

/**
 * Highest scoring audio track; the first one in probe order wins a tie.
 */
export function selectPrimaryAudio(
  audioTracks: readonly Track[],
  container: VideoContainer | undefined,
  preferredLanguage?: string
): Track | undefined {
  let chosen = audioTracks[0];
  let highestScore = 0;

  for (const track of audioTracks) {
    const score = scoreAudioTrack(track, container, preferredLanguage);
    if (score > highestScore) {
      chosen = track;
      highestScore = score;
    }
  }

  return chosen;
}

/**
 * Nearest accepted quality tier. Halfway values go to the lower tier.
 */
export function snapToQualityTier(height: number): number {
  let best = ACCEPTED_QUALITIES[0] ?? height;
  for (const tier of ACCEPTED_QUALITIES) {
    if (Math.abs(tier - height) < Math.abs(best - height)) {
      best = tier;
    }
  }
  return best;
}

/**
 * Quality to declare for a video track.
 * 
 * @throws MissingScanlineCountError when the track has no coded height
 * @throws UnsupportedQualityError in strict mode for heights outside the tiers
 */
export function resolveQuality(track: Track, mode: QualityMode = 'snap'): number {
  const height = track.scanlineCount;
  if (height === undefined) {
    throw new MissingScanlineCountError(track.index);
  }
  if (mode === 'exact' || ACCEPTED_QUALITIES.includes(height)) {
    return height;
  }
  if (mode === 'strict') {
    throw new UnsupportedQualityError(track.index, height, ACCEPTED_QUALITIES);
  }

  const quality = snapToQualityTier(height);
  log.warn({ trackIndex: track.index, height, quality }, 'Snapped video height to nearest quality tier');
  return quality;
}

export function streamMapping(track: Track): string {
  return `0:${track.index}`;
}

/**
 * Collects operations and manifest entries so every manifest URL is built
 * from the same file name as the operation writing it.
 */
class PlanAccumulator {
  readonly operations: StreamOperation[] = [];
  readonly outputs: OutputFile[] = [];
  readonly skipped: SkippedTrack[] = [];
  readonly sources: ManifestSource[] = [];
  readonly audioTracks: ManifestAudioTrack[] = [];
  readonly textTracks: ManifestTextTrack[] = [];

  constructor(private readonly urlPrefix: string) {}

  /**
   * @returns the manifest URL of the output
   */
  add(track: Track, action: StreamAction, output: string, format?: string): string {
    this.operations.push({
      trackIndex: track.index,
      kind: track.kind,
      mapping: streamMapping(track),
      action,
      output,
    });

    if (!this.outputs.some(file => file.name === output)) {
      this.outputs.push(format ? { name: output, format } : { name: output });
    }

    return this.urlPrefix + output;
  }

  skip(track: Track, reason: SkipReason): void {
    log.debug({ trackIndex: track.index, kind: track.kind, codec: track.codec, reason }, 'Skipping track');
    this.skipped.push({ trackIndex: track.index, kind: track.kind, codec: track.codec, reason });
  }
}

function primaryAudioAction(container: VideoContainer, audio: Track): StreamAction {
  if (acceptsAudioCodec(container, audio.codec)) {
    return requiresExperimentalMux(container, audio.codec)
      ? { type: 'copy', experimental: true }
      : { type: 'copy' };
  }
  return {
    type: 'encode',
    codec: VIDEO_CONTAINERS[container].preferredAudioEncoder,
    channels: ENCODE_CHANNELS,
  };
}

function planPrimary(
  acc: PlanAccumulator,
  video: Track,
  audio: Track | undefined,
  probe: ProbeResult,
  qualityMode: QualityMode
): void {
  const quality = resolveQuality(video, qualityMode);
  const container = findVideoContainer(video.codec);

  if (container) {
    const info = VIDEO_CONTAINERS[container];
    const output = `main.${info.extension}`;

    const url = acc.add(video, { type: 'copy' }, output);
    if (audio) {
      acc.add(audio, primaryAudioAction(container, audio), output);
    }

    // Overall bitrate; ffprobe does not report a video-only one for most containers
    acc.sources.push({ url, contentType: info.mimeType, quality, bitrate: probe.bitrate });
    return;
  }

  // No container takes this codec, so it all gets re-encoded
  log.info({ trackIndex: video.index, codec: video.codec }, 'Video codec unsupported, re-encoding to AV1');
  const info = VIDEO_CONTAINERS[FALLBACK_ENCODING.container];
  const output = `main.${info.extension}`;

  const url = acc.add(video, { type: 'encode', codec: FALLBACK_ENCODING.videoEncoder }, output);
  if (audio) {
    acc.add(audio, { type: 'encode', codec: FALLBACK_ENCODING.audioEncoder, channels: ENCODE_CHANNELS }, output);
  }

  acc.sources.push({ url, contentType: info.mimeType, quality, bitrate: probe.bitrate });
}

function planSecondaryAudio(acc: PlanAccumulator, track: Track): void {
  const container = findAudioContainer(track.codec);
  if (!container) {
    // Would need a re-encode, which secondary tracks don't get
    acc.skip(track, 'unsupported-codec');
    return;
  }

  const info = AUDIO_CONTAINERS[container];
  const language = track.language ?? UNKNOWN_LANGUAGE;
  const output = `audio_${track.index}_${language}.${info.extension}`;

  const url = acc.add(track, { type: 'copy' }, output, info.muxer);
  acc.audioTracks.push({
    url,
    label: buildLanguageLabel(language, track.title),
    language: manifestLanguage(language),
    contentType: info.mimeType,
  });
}

function planSubtitle(acc: PlanAccumulator, track: Track): void {
  if (isBitmapSubtitle(track.codec)) {
    acc.skip(track, 'bitmap-subtitle');
    return;
  }

  const output = `sub_${track.index}_${track.language ?? UNKNOWN_LANGUAGE}.${SUBTITLE_OUTPUT.extension}`;
  const url = acc.add(track, { type: 'encode', codec: SUBTITLE_OUTPUT.encoder }, output);

  const name = track.language
    ? buildLanguageLabel(track.language, track.title)
    : track.title ?? 'Unknown';
  acc.textTracks.push({ url, name, contentType: SUBTITLE_OUTPUT.mimeType });
}

/**
 * Build the transcode plan and manifest for one probed file.
 * 
 * @throws MissingScanlineCountError if the primary video track has no coded height
 * @throws UnsupportedQualityError in strict quality mode
 */
export function buildRemuxPlan(probe: ProbeResult, options: PlanOptions): RemuxPlan {
  const {
    inputFile,
    urlPrefix,
    preferredLanguage,
    qualityMode = 'snap',
    videoOnlySource = false,
  } = options;

  const tracks = classifyTracks(probe.tracks);
  const acc = new PlanAccumulator(urlPrefix);

  const [video, ...extraVideo] = tracks.video;
  if (video) {
    for (const track of extraVideo) {
      acc.skip(track, 'secondary-video');
    }

    const audio = selectPrimaryAudio(tracks.audio, findVideoContainer(video.codec), preferredLanguage);
    if (audio || videoOnlySource) {
      planPrimary(acc, video, audio, probe, qualityMode);
    } else {
      log.warn({ trackIndex: video.index }, 'No audio track to pair with video, omitting source');
    }

    for (const track of tracks.audio) {
      // Already muxed into the main file
      if (track.index === audio?.index) continue;
      planSecondaryAudio(acc, track);
    }
  } else if (tracks.audio.length > 0) {
    log.warn({ audioTracks: tracks.audio.length }, 'No video track, audio tracks are not extracted');
  }

  for (const track of tracks.subtitle) {
    planSubtitle(acc, track);
  }

  const manifest: CustomManifest = {
    title: options.title ?? probe.title ?? getBasename(inputFile),
    duration: probe.duration,
    sources: acc.sources,
    audioTracks: acc.audioTracks,
    textTracks: acc.textTracks,
  };

  log.info(
    {
      inputFile,
      operations: acc.operations.length,
      outputs: acc.outputs.length,
      skipped: acc.skipped.length,
    },
    'Built remux plan'
  );

  return {
    operations: acc.operations,
    outputs: acc.outputs,
    skipped: acc.skipped,
    manifest,
  };
}
