import { ValidationError } from '../errors';
import { FIELD_LIMITS } from '../validation';
import { Annotation } from './Annotation';

/**
 * Request body for adding annotations to a report. Order is preserved.
 */
export class AnnotationBatch {
  private constructor(private readonly _annotations: readonly Annotation[]) {}

  static create(annotations: readonly Annotation[]): AnnotationBatch {
    if (annotations.length === 0) {
      throw new ValidationError('annotations', 'must contain at least one annotation');
    }
    if (annotations.length > FIELD_LIMITS.annotationsPerRequest) {
      throw new ValidationError(
        'annotations',
        `at most ${FIELD_LIMITS.annotationsPerRequest} annotations are allowed per request, got ${annotations.length}`,
      );
    }
    return new AnnotationBatch(Object.freeze([...annotations]));
  }

  get annotations(): readonly Annotation[] {
    return this._annotations;
  }

  get size(): number {
    return this._annotations.length;
  }

  equals(other: AnnotationBatch): boolean {
    return (
      this._annotations.length === other.size &&
      this._annotations.every((annotation, i) => annotation.equals(other.annotations[i]))
    );
  }
}
