import { v4 as uuid } from 'uuid';
import type { ImageSegment, MediaRef, Segment, SegmentInput, VideoSegment } from '../types/domain';
import { validateSegments } from './validators';

export class SegmentValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid segment list: ${issues.join('; ')}`);
    this.name = 'SegmentValidationError';
    this.issues = issues;
  }
}

export function createImageSegment(imageRef: MediaRef, videoRepresentation?: MediaRef): ImageSegment {
  const segment: ImageSegment = { id: uuid(), kind: 'image', imageRef };
  if (videoRepresentation !== undefined) segment.videoRepresentation = videoRepresentation;
  return Object.freeze(segment);
}

export function createVideoSegment(videoRef: MediaRef): VideoSegment {
  return Object.freeze<VideoSegment>({ id: uuid(), kind: 'video', videoRef });
}

/**
 * Builds a segment from loosely typed capture output. A photo captured
 * together with a video keeps the video as its representation.
 */
export function createSegment(input: SegmentInput): Segment {
  const id = input.id ?? uuid();
  if (input.imageRef) {
    const segment: ImageSegment = { id, kind: 'image', imageRef: input.imageRef };
    if (input.videoRef) segment.videoRepresentation = input.videoRef;
    return Object.freeze(segment);
  }
  if (input.videoRef) {
    return Object.freeze<VideoSegment>({ id, kind: 'video', videoRef: input.videoRef });
  }
  throw new SegmentValidationError([`Segment ${id} has neither an image nor a video reference`]);
}

export function assertPlayableSegments(segments: readonly Segment[]): readonly Segment[] {
  const issues = validateSegments(segments);
  if (issues.length) {
    throw new SegmentValidationError(issues);
  }
  return Object.isFrozen(segments) ? segments : Object.freeze([...segments]);
}

export function segmentRef(segment: Segment): MediaRef {
  return segment.kind === 'image' ? segment.imageRef : segment.videoRef;
}
