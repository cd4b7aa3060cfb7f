import { Annotation, SchemaError } from '../../domain';
import { ANNOTATION_KEYS, AnnotationDto } from '../dto';
import { createLogger, Logger } from '../logging';
import { ISerializer } from './ISerializer';
import { build, readDto } from './documents';

export class AnnotationSerializer implements ISerializer<Annotation, AnnotationDto> {
  constructor(private readonly logger: Logger = createLogger('AnnotationSerializer')) {}

  serialize(annotation: Annotation): AnnotationDto {
    const dto: AnnotationDto = {
      path: annotation.path,
      line: annotation.line,
      message: annotation.message,
    };

    if (annotation.severity !== undefined) dto.severity = annotation.severity;
    if (annotation.type !== undefined) dto.type = annotation.type;
    if (annotation.link !== undefined) dto.link = annotation.link;
    if (annotation.externalId !== undefined) dto.externalId = annotation.externalId;

    return dto;
  }

  deserialize(document: unknown, path = ''): Annotation {
    try {
      const dto = readDto(AnnotationDto, document, ANNOTATION_KEYS, path);
      return build(path, () =>
        Annotation.create({
          path: dto.path,
          line: dto.line,
          message: dto.message,
          severity: dto.severity,
          type: dto.type,
          link: dto.link,
          externalId: dto.externalId,
        }),
      );
    } catch (error) {
      // Batches log once for the whole document
      if (error instanceof SchemaError && !path) {
        this.logger.debug(`Rejected annotation document: ${error.message}`);
      }
      throw error;
    }
  }
}
