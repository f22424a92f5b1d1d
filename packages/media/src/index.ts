/**
 * @remuxer/media
 * 
 * Media inspection layer.
 * 
 * Responsibilities:
 * - Run ffprobe against the input file
 * - Parse its compact output into tracks and container facts
 * - Partition tracks by kind
 */

// Probing
export { FFProbe, buildProbeArgs, PROBE_ENTRIES, type FFProbeOptions } from './probes/ffprobe.js';
export {
  parseProbeOutput,
  parseProbeRecord,
  parseTrackKind,
  splitProbeLine,
  type ProbeRecord,
} from './probes/parser.js';

// Classification
export { classifyTracks } from './classifier.js';

// Types
export { TRACK_KINDS } from './types.js';
export type { Track, TrackKind, ProbeResult, ClassifiedTracks } from './types.js';
