export { DataFieldDto, ReportDto, DATA_FIELD_KEYS, REPORT_KEYS } from './report.dto';
export { AnnotationDto, AnnotationBatchDto, ANNOTATION_KEYS, ANNOTATION_BATCH_KEYS } from './annotation.dto';
export { OptionalKey } from './decorators';
