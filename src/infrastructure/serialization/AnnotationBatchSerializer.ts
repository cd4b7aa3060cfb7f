import { AnnotationBatch, SchemaError } from '../../domain';
import { ANNOTATION_BATCH_KEYS, AnnotationBatchDto } from '../dto';
import { createLogger, Logger } from '../logging';
import { AnnotationSerializer } from './AnnotationSerializer';
import { ISerializer } from './ISerializer';
import { build, joinPath, readDto } from './documents';

/**
 * Serializer for the `{ "annotations": [...] }` body posted to a report's
 * annotations endpoint.
 */
export class AnnotationBatchSerializer implements ISerializer<AnnotationBatch, AnnotationBatchDto> {
  constructor(
    private readonly annotationSerializer: AnnotationSerializer = new AnnotationSerializer(),
    private readonly logger: Logger = createLogger('AnnotationBatchSerializer'),
  ) {}

  serialize(batch: AnnotationBatch): AnnotationBatchDto {
    const annotations = batch.annotations.map((annotation) => this.annotationSerializer.serialize(annotation));
    this.logger.debug(`Serialized ${annotations.length} annotation(s)`);
    return { annotations };
  }

  deserialize(document: unknown, path = ''): AnnotationBatch {
    try {
      const dto = readDto(AnnotationBatchDto, document, ANNOTATION_BATCH_KEYS, path);
      const annotationsPath = joinPath(path, 'annotations');
      const annotations = dto.annotations.map((entry, i) =>
        this.annotationSerializer.deserialize(entry, `${annotationsPath}[${i}]`),
      );
      return build(path, () => AnnotationBatch.create(annotations));
    } catch (error) {
      if (error instanceof SchemaError) {
        this.logger.debug(`Rejected annotation batch document: ${error.message}`);
      }
      throw error;
    }
  }
}
