// ---------------------------------------------------------------------------
// Primary-detection selection
// ---------------------------------------------------------------------------
// score = confidence / (‖centre − (0.5, 0.5)‖ + 0.1)
// Favours detections that are both confident and near the crosshair.

import type { Detection, FrameSize } from '../types.js';
import { normalizedCenter } from '../geometry.js';

/** Keeps the score finite for a detection centred on the crosshair. */
export const CENTER_EPSILON = 0.1;

export function primaryScore(detection: Detection, frame: FrameSize): number {
  const c = normalizedCenter(detection, frame);
  const dist = Math.hypot(c.x - 0.5, c.y - 0.5);
  return detection.confidence / (dist + CENTER_EPSILON);
}

/**
 * Pick the detection most relevant to the aim point.
 * Exact score ties go to the detection listed first.
 */
export function selectPrimaryDetection(
  detections: readonly Detection[],
  frame: FrameSize,
): Detection | undefined {
  let best: Detection | undefined;
  let bestScore = -Infinity;

  for (const d of detections) {
    const score = primaryScore(d, frame);
    if (score > bestScore) {
      best = d;
      bestScore = score;
    }
  }

  return best;
}
