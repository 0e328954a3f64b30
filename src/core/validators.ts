import type { Segment } from '../types/domain';

export function validateSegments(segments: readonly Segment[]): string[] {
  const errors: string[] = [];
  if (!segments.length) {
    errors.push('Preview must contain at least one segment.');
  }
  segments.forEach((segment, index) => {
    if (segment.kind === 'image') {
      if (!segment.imageRef) {
        errors.push(`Missing image reference for segment ${index} (${segment.id})`);
      }
      if (segment.videoRepresentation === '') {
        errors.push(`Empty video representation for segment ${index} (${segment.id})`);
      }
    } else if (segment.kind === 'video') {
      if (!segment.videoRef) {
        errors.push(`Missing video reference for segment ${index} (${segment.id})`);
      }
    } else {
      errors.push(`Unknown kind for segment ${index}`);
    }
  });
  return errors;
}
