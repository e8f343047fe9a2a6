// ---------------------------------------------------------------------------
// Detection geometry and camera intrinsics helpers
// ---------------------------------------------------------------------------

import type { CameraIntrinsics, Detection, FrameSize, PixelBox, Point2D } from './types.js';

export function pixelCenter(box: PixelBox): Point2D {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

/** Box centre in [0,1] frame coordinates, top-left origin. */
export function normalizedCenter(detection: Detection, frame: FrameSize): Point2D {
  const c = pixelCenter(detection.box);
  return { x: c.x / frame.width, y: c.y / frame.height };
}

export function pixelDiagonal(box: PixelBox): number {
  return Math.sqrt(box.width * box.width + box.height * box.height);
}

/** Width / height of the box; 0 for a degenerate box. */
export function boxAspect(box: PixelBox): number {
  return box.height > 0 ? box.width / box.height : 0;
}

/**
 * Fallback intrinsics for a typical phone wide camera recording 4K video
 * (≈26 mm equivalent). Approximate; prefer per-frame intrinsics.
 */
export const DEFAULT_INTRINSICS: Readonly<CameraIntrinsics> = Object.freeze({
  fx: 2900,
  fy: 2900,
  cx: 1920,
  cy: 1080,
  reference: Object.freeze({ width: 3840, height: 2160 }),
});

/**
 * Rescale intrinsics computed for `reference` to a frame of another size.
 * Intrinsics without a reference size are returned unchanged.
 */
export function scaleIntrinsics(intrinsics: CameraIntrinsics, frame: FrameSize): CameraIntrinsics {
  const ref = intrinsics.reference;
  if (!ref || ref.width <= 0 || ref.height <= 0) return intrinsics;
  if (ref.width === frame.width && ref.height === frame.height) return intrinsics;

  const sx = frame.width / ref.width;
  const sy = frame.height / ref.height;
  return {
    fx: intrinsics.fx * sx,
    fy: intrinsics.fy * sy,
    cx: intrinsics.cx === undefined ? undefined : intrinsics.cx * sx,
    cy: intrinsics.cy === undefined ? undefined : intrinsics.cy * sy,
    reference: { width: frame.width, height: frame.height },
  };
}
