/**
 * Track Classifier
 */

import type { ClassifiedTracks, Track } from './types.js';

/**
 * Stable partition of tracks by kind; probe order is kept within each group.
 */
export function classifyTracks(tracks: readonly Track[]): ClassifiedTracks {
  const classified: ClassifiedTracks = { video: [], audio: [], subtitle: [] };
  for (const track of tracks) {
    classified[track.kind].push(track);
  }
  return classified;
}
