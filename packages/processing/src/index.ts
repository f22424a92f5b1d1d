/**
 * @remuxer/processing
 * 
 * Remux planning and execution layer.
 * 
 * CRITICAL RULES:
 * - NEVER re-encode a stream a target container accepts as-is
 * - Every manifest URL is the prefix plus the exact output file name
 * - Log every FFmpeg command executed
 */

// Compatibility model
export {
  VIDEO_CONTAINERS,
  AUDIO_CONTAINERS,
  BITMAP_SUBTITLE_CODECS,
  SUBTITLE_OUTPUT,
  FALLBACK_ENCODING,
  ENCODE_CHANNELS,
  ACCEPTED_QUALITIES,
  findVideoContainer,
  findAudioContainer,
  acceptsAudioCodec,
  requiresExperimentalMux,
  isBitmapSubtitle,
  type VideoContainer,
  type AudioContainer,
  type VideoContainerInfo,
  type AudioContainerInfo,
  type AudioEncoder,
  type VideoEncoder,
  type SubtitleEncoder,
  type SubtitleOutput,
  type FallbackEncoding,
} from './compatibility.js';

// Language labels
export {
  languageName,
  manifestLanguage,
  buildLanguageLabel,
  loadLanguageTable,
  type LanguageTable,
} from './languages.js';

// Planner
export {
  buildRemuxPlan,
  scoreAudioTrack,
  selectPrimaryAudio,
  resolveQuality,
  snapToQualityTier,
  streamMapping,
} from './planner.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  createPlanCommand,
  type InputOptions,
  type OutputOptions,
  type OutputSpec,
  type CodecSetting,
  type StreamType,
} from './commandBuilder.js';

// FFmpeg wrapper
export { FFmpeg, type FFmpegOptions, type ExecuteOptions } from './ffmpeg.js';

// Types
export { QUALITY_MODES } from './types.js';
export type {
  StreamAction,
  StreamOperation,
  OutputFile,
  SkipReason,
  SkippedTrack,
  ManifestSource,
  ManifestAudioTrack,
  ManifestTextTrack,
  CustomManifest,
  RemuxPlan,
  QualityMode,
  PlanOptions,
} from './types.js';
