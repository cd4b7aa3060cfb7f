import { loadConfig } from '../../config';
import { Annotation, AnnotationBatch, Report, SchemaError } from '../../domain';
import { AnnotationBatchDto, AnnotationDto, ReportDto } from '../dto';
import { AnnotationBatchSerializer } from './AnnotationBatchSerializer';
import { AnnotationSerializer } from './AnnotationSerializer';
import { ReportSerializer } from './ReportSerializer';

export { ISerializer } from './ISerializer';
export { ReportSerializer } from './ReportSerializer';
export { AnnotationSerializer } from './AnnotationSerializer';
export { AnnotationBatchSerializer } from './AnnotationBatchSerializer';

export type SchemaValue = Report | Annotation | AnnotationBatch;
export type SchemaDocument = ReportDto | AnnotationDto | AnnotationBatchDto;

export const reportSerializer = new ReportSerializer();
export const annotationSerializer = new AnnotationSerializer();
export const annotationBatchSerializer = new AnnotationBatchSerializer(annotationSerializer);

export function serialize(value: Report): ReportDto;
export function serialize(value: Annotation): AnnotationDto;
export function serialize(value: AnnotationBatch): AnnotationBatchDto;
export function serialize(value: SchemaValue): SchemaDocument;
export function serialize(value: SchemaValue): SchemaDocument {
  if (value instanceof Report) return reportSerializer.serialize(value);
  if (value instanceof Annotation) return annotationSerializer.serialize(value);
  return annotationBatchSerializer.serialize(value);
}

/**
 * The request body for the external HTTP layer, which supplies the
 * `application/json` content type and credentials itself.
 */
export function toJson(value: SchemaValue, indent: number = loadConfig().jsonIndent): string {
  return JSON.stringify(serialize(value), null, indent);
}

export function deserializeReport(document: unknown): Report {
  return reportSerializer.deserialize(document);
}

export function deserializeAnnotation(document: unknown): Annotation {
  return annotationSerializer.deserialize(document);
}

export function deserializeAnnotationBatch(document: unknown): AnnotationBatch {
  return annotationBatchSerializer.deserialize(document);
}

export function parseReport(json: string): Report {
  return deserializeReport(parseDocument(json));
}

export function parseAnnotation(json: string): Annotation {
  return deserializeAnnotation(parseDocument(json));
}

export function parseAnnotationBatch(json: string): AnnotationBatch {
  return deserializeAnnotationBatch(parseDocument(json));
}

function parseDocument(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaError('$', 'invalid-json', reason, { cause: error });
  }
}
