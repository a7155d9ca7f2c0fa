// Segmenter: linear scan over the worn flag.

import type { AlignedFrame, Segment, WornState } from "../types";

export function segmentFrame(frame: Pick<AlignedFrame, "worn">): Segment[] {
  const worn = frame.worn;
  const segments: Segment[] = [];
  if (worn.length === 0) return segments;

  let start = 0;
  for (let i = 1; i <= worn.length; i++) {
    if (i === worn.length || worn[i] !== worn[i - 1]) {
      segments.push({ index: segments.length, worn: worn[start], start, end: i });
      start = i;
    }
  }
  return segments;
}

export function segmentsByState(segments: ReadonlyArray<Segment>, state: WornState): Segment[] {
  return segments.filter((s) => s.worn === state);
}

export function segmentLength(segment: Segment): number {
  return segment.end - segment.start;
}

export function segmentPositions(segment: Segment): number[] {
  const out: number[] = [];
  for (let i = segment.start; i < segment.end; i++) out.push(i);
  return out;
}
